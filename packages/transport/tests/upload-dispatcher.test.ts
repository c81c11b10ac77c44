import { describe, expect, it, vi } from 'vitest';
import { setTimeout as pause } from 'node:timers/promises';
import { DEFAULT_ENROLLMENT_CONFIG, Logger } from '@mac-enroll/core';
import type { EnrollmentRecord } from '@mac-enroll/core';
import { MachineList, createManualRecord } from '@mac-enroll/reconcile';
import { ShareTransport, sendMachines, summarizeDeliveries } from '../src/index.js';
import type { AuthGate, SendContext, ShareClient } from '../src/index.js';

function machine(assetNumber: string): EnrollmentRecord {
  return createManualRecord(
    {
      endUserName: 'Jane Roe',
      sciper: '100001',
      assetNumber,
      serialNumber: `SN-${assetNumber}`,
      friendlyName: `MBP-${assetNumber}`,
      employeeType: 'Hôte',
      deviceType: 'Laptop',
    },
    DEFAULT_ENROLLMENT_CONFIG,
    () => `id-${assetNumber}`
  );
}

/** Share client shared by every session; tracks uploads and concurrency */
class FakeShare {
  readonly uploaded: string[] = [];
  readonly attempts: string[] = [];
  readonly failing = new Set<string>();
  /** Paths that fail once, then succeed */
  readonly flaky = new Set<string>();
  /** Paths whose upload only ends when aborted */
  readonly stalled = new Set<string>();
  inFlight = 0;
  maxInFlight = 0;

  client(): ShareClient {
    return {
      login: async () => {},
      connectShare: async () => {},
      upload: async (_content, path, signal) => {
        this.attempts.push(path);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
          await pause(this.stalled.has(path) ? 5_000 : 5, undefined, { signal });
          if (this.failing.has(path)) throw new Error('access denied');
          if (this.flaky.delete(path)) throw new Error('connection reset');
          this.uploaded.push(path);
        } finally {
          this.inFlight--;
        }
      },
      disconnectShare: async () => {},
    };
  }
}

const allow: AuthGate = { challenge: async () => true };

function context(share: FakeShare, overrides: Partial<SendContext> = {}): SendContext {
  return {
    testMode: false,
    testStorageDir: '/unused',
    sharePath: 'smb://files.example.org/enroll',
    credentials: async () => ({ username: 'svc-enroll', password: 'test-secret' }),
    createTransport: () => new ShareTransport(share.client()),
    authGate: allow,
    ...overrides,
  };
}

describe('sendMachines', () => {
  it('does nothing for an empty list', async () => {
    const gate = { challenge: vi.fn(async () => true) };

    const outcome = await sendMachines(new MachineList(), context(new FakeShare(), { authGate: gate }));

    expect(outcome.status).toBe('empty');
    expect(outcome.summary).toBe('No machines to send.');
    expect(gate.challenge).not.toHaveBeenCalled();
  });

  it('sends nothing when the operator is not confirmed', async () => {
    const share = new FakeShare();
    const list = new MachineList([machine('INV1')]);

    const outcome = await sendMachines(
      list,
      context(share, { authGate: { challenge: async () => false } })
    );

    expect(outcome.status).toBe('unauthenticated');
    expect(outcome.summary).toBe('Authentication failed.');
    expect(share.uploaded).toEqual([]);
    expect(list.size).toBe(1);
  });

  it('treats a failing auth check as a refusal', async () => {
    const outcome = await sendMachines(
      new MachineList([machine('INV1')]),
      context(new FakeShare(), {
        authGate: {
          challenge: async () => {
            throw new Error('no terminal');
          },
        },
      })
    );

    expect(outcome.status).toBe('unauthenticated');
  });

  it('removes delivered records and keeps failed ones', async () => {
    const share = new FakeShare();
    share.failing.add('scx-INV2.json');
    const list = new MachineList([machine('INV1'), machine('INV2'), machine('INV3')]);
    const progress: Array<[number, number]> = [];

    const outcome = await sendMachines(
      list,
      context(share, { onProgress: (done, total) => progress.push([done, total]) })
    );

    expect(outcome.status).toBe('completed');
    expect(outcome.sent).toBe(2);
    expect(outcome.summary.split('\n')[0]).toBe('2 file(s) saved out of 3.');
    expect(list.toArray().map((r) => r.id)).toEqual(['id-INV2']);
    expect([...share.uploaded].sort()).toEqual(['scx-INV1.json', 'scx-INV3.json']);
    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(outcome.deliveries.find((d) => d.record.id === 'id-INV2')?.result).toEqual({
      success: false,
      message: 'Error sending file: Upload of scx-INV2.json failed: access denied',
      code: 'TRANSPORT_ERROR',
    });
  });

  it('keeps every record when configuration is missing', async () => {
    const list = new MachineList([machine('INV1'), machine('INV2')]);

    const outcome = await sendMachines(
      list,
      context(new FakeShare(), { credentials: async () => undefined })
    );

    expect(outcome.sent).toBe(0);
    expect(outcome.summary).toBe('0 file(s) saved out of 2.\nConfiguration missing');
    expect(list.size).toBe(2);
  });

  it('bounds the number of uploads in flight', async () => {
    const share = new FakeShare();
    const list = new MachineList(['A', 'B', 'C', 'D', 'E', 'F'].map(machine));

    await sendMachines(list, context(share, { concurrency: 2 }));

    expect(share.uploaded).toHaveLength(6);
    expect(share.maxInFlight).toBeLessThanOrEqual(2);
    expect(list.isEmpty).toBe(true);
  });

  it('retries a transient upload failure', async () => {
    const share = new FakeShare();
    share.flaky.add('scx-INV1.json');
    const list = new MachineList([machine('INV1')]);

    const outcome = await sendMachines(
      list,
      context(share, { retry: { attempts: 2, baseDelayMs: 1 } })
    );

    expect(outcome.sent).toBe(1);
    expect(list.isEmpty).toBe(true);
  });

  it('does not retry a timed-out upload or let it outlive its slot', async () => {
    const share = new FakeShare();
    share.stalled.add('scx-INV1.json');
    const list = new MachineList([machine('INV1'), machine('INV2')]);

    const outcome = await sendMachines(
      list,
      context(share, { concurrency: 1, timeoutMs: 20, retry: { attempts: 3, baseDelayMs: 1 } })
    );

    expect(share.attempts).toEqual(['scx-INV1.json', 'scx-INV2.json']);
    expect(share.maxInFlight).toBe(1);
    expect(share.uploaded).toEqual(['scx-INV2.json']);
    expect(list.toArray().map((r) => r.id)).toEqual(['id-INV1']);
    expect(outcome.deliveries[0]?.result).toEqual({
      success: false,
      message: 'Error sending file: Upload timed out after 20 ms',
      code: 'TRANSPORT_ERROR',
    });
  });

  it('logs each failed upload', async () => {
    const share = new FakeShare();
    share.failing.add('scx-INV1.json');
    const lines: string[] = [];

    await sendMachines(
      new MachineList([machine('INV1')]),
      context(share, { logger: new Logger({ format: 'json', sink: (line) => lines.push(line) }) })
    );

    const records = lines.map((line) => JSON.parse(line));
    expect(records.map((r) => r.msg)).toEqual(['Upload failed', 'Send finished']);
    expect(records[0].file).toBe('scx-INV1.json');
  });
});

describe('summarizeDeliveries', () => {
  it('appends the last message on its own line', () => {
    expect(summarizeDeliveries(1, 2, 'File saved to smb://h/s')).toBe(
      '1 file(s) saved out of 2.\nFile saved to smb://h/s'
    );
    expect(summarizeDeliveries(0, 0)).toBe('0 file(s) saved out of 0.');
  });
});
