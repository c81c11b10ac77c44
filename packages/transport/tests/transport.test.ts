import { describe, expect, it, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { setTimeout as pause } from 'node:timers/promises';
import { EnrollError, Logger } from '@mac-enroll/core';
import {
  DeliveryLog,
  MountedShareClient,
  ShareTransport,
  UploadSlots,
  deliverFile,
  isRetryableDelivery,
  parseSharePath,
  retryDelayMs,
  retryDelivery,
  withTimeout,
} from '../src/index.js';
import type { DeliveryContext, ShareClient, ShareCredentials } from '../src/index.js';

let tmpDir = '';

function makeTmpDir(): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'transport-'));
  return tmpDir;
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

const bytes = new TextEncoder().encode('{"AssetNumber":"INV1"}');
const credentials: ShareCredentials = { username: 'svc-enroll', password: 'test-secret' };

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

class RecordingClient implements ShareClient {
  readonly calls: string[] = [];
  failUpload: Error | null = null;
  failDisconnect: Error | null = null;
  /** Uploads wait this long unless aborted */
  uploadDelayMs = 0;

  async login(username: string, password: string): Promise<void> {
    this.calls.push(`login ${username} ${password}`);
  }
  async connectShare(name: string): Promise<void> {
    this.calls.push(`connectShare ${name}`);
  }
  async upload(_content: Uint8Array, path: string, signal?: AbortSignal): Promise<void> {
    if (this.uploadDelayMs > 0) await pause(this.uploadDelayMs, undefined, { signal });
    if (this.failUpload) throw this.failUpload;
    this.calls.push(`upload ${path}`);
  }
  async disconnectShare(): Promise<void> {
    this.calls.push('disconnectShare');
    if (this.failDisconnect) throw this.failDisconnect;
  }
}

function shareContext(client: ShareClient, overrides: Partial<DeliveryContext> = {}): DeliveryContext {
  return {
    testMode: false,
    testStorageDir: '/unused',
    sharePath: 'smb://files.example.org/enroll/incoming/macs',
    credentials: async () => credentials,
    createTransport: () => new ShareTransport(client),
    ...overrides,
  };
}

describe('parseSharePath', () => {
  it('splits host, share and directory', () => {
    expect(parseSharePath('smb://files.example.org/enroll/incoming/macs')).toEqual({
      host: 'files.example.org',
      share: 'enroll',
      directory: 'incoming/macs',
    });
    expect(parseSharePath('smb://files.example.org/enroll/')).toEqual({
      host: 'files.example.org',
      share: 'enroll',
      directory: '',
    });
  });

  it('rejects text that is not a URL', () => {
    expect(thrownBy(() => parseSharePath('not a share'))).toMatchObject({
      code: 'INVALID_SHARE_PATH',
    });
  });

  it('requires a share name', () => {
    expect(thrownBy(() => parseSharePath('smb://files.example.org'))).toMatchObject({
      code: 'TRANSPORT_ERROR',
      message: 'Share path is missing the share name',
    });
  });
});

describe('deliverFile', () => {
  it('writes locally in test mode', async () => {
    const dir = makeTmpDir();
    const storage = join(dir, 'TestStorage');

    const result = await deliverFile('scx-INV1.json', bytes, {
      ...shareContext(new RecordingClient()),
      testMode: true,
      testStorageDir: storage,
    });

    expect(result).toEqual({
      success: true,
      message: `File saved locally to ${join(storage, 'scx-INV1.json')}`,
    });
    expect(readFileSync(join(storage, 'scx-INV1.json'), 'utf-8')).toBe('{"AssetNumber":"INV1"}');
  });

  it('uploads through the share client', async () => {
    const client = new RecordingClient();

    const result = await deliverFile('scx-INV1.json', bytes, shareContext(client));

    expect(result).toEqual({
      success: true,
      message: 'File saved to smb://files.example.org/enroll/incoming/macs',
    });
    expect(client.calls).toEqual([
      'login svc-enroll test-secret',
      'connectShare enroll',
      'upload incoming/macs/scx-INV1.json',
      'disconnectShare',
    ]);
  });

  it('reports missing credentials without contacting the share', async () => {
    const client = new RecordingClient();

    const result = await deliverFile(
      'scx-INV1.json',
      bytes,
      shareContext(client, { credentials: async () => undefined })
    );

    expect(result).toEqual({
      success: false,
      message: 'Configuration missing',
      code: 'CONFIG_MISSING',
    });
    expect(client.calls).toEqual([]);
  });

  it('reports a missing share path as missing configuration', async () => {
    const result = await deliverFile(
      'scx-INV1.json',
      bytes,
      shareContext(new RecordingClient(), { sharePath: undefined })
    );

    expect(result.code).toBe('CONFIG_MISSING');
  });

  it('turns a client failure into a result', async () => {
    const client = new RecordingClient();
    client.failUpload = new Error('disk full');

    const result = await deliverFile('scx-INV1.json', bytes, shareContext(client));

    expect(result).toEqual({
      success: false,
      message: 'Error sending file: Upload of incoming/macs/scx-INV1.json failed: disk full',
      code: 'TRANSPORT_ERROR',
    });
    expect(client.calls).toEqual([
      'login svc-enroll test-secret',
      'connectShare enroll',
      'disconnectShare',
    ]);
  });

  it('reports the upload error when disconnecting also fails', async () => {
    const client = new RecordingClient();
    client.failUpload = new Error('disk full');
    client.failDisconnect = new Error('session gone');
    const lines: string[] = [];

    const result = await deliverFile(
      'scx-INV1.json',
      bytes,
      shareContext(client, {
        logger: new Logger({ format: 'json', sink: (line) => lines.push(line) }),
      })
    );

    expect(result.message).toBe(
      'Error sending file: Upload of incoming/macs/scx-INV1.json failed: disk full'
    );
    expect(lines.map((line) => JSON.parse(line).msg)).toEqual([
      'Disconnect after failed upload failed',
    ]);
  });

  it('aborts a slow upload and disconnects', async () => {
    const client = new RecordingClient();
    client.uploadDelayMs = 5_000;

    const result = await deliverFile(
      'scx-INV1.json',
      bytes,
      shareContext(client, { timeoutMs: 20 })
    );

    expect(result).toEqual({
      success: false,
      message: 'Error sending file: Upload timed out after 20 ms',
      code: 'TRANSPORT_ERROR',
    });
    expect(client.calls).toEqual([
      'login svc-enroll test-secret',
      'connectShare enroll',
      'disconnectShare',
    ]);
  });
});

describe('withTimeout', () => {
  it('waits for a task that ignores the abort and keeps its result', async () => {
    await expect(
      withTimeout(async () => {
        await pause(30);
        return 'landed';
      }, 5)
    ).resolves.toBe('landed');
  });

  it('marks a failure after the abort as a timeout that is not retried', async () => {
    const error = await withTimeout((signal) => pause(1_000, undefined, { signal }), 5).catch(
      (err: unknown) => err
    );

    expect(error).toMatchObject({ code: 'TRANSPORT_ERROR', context: { timedOut: true } });
    expect(isRetryableDelivery(error)).toBe(false);
  });
});

describe('retryDelivery', () => {
  it('doubles the delay up to the cap', () => {
    const cfg = { baseDelayMs: 100, maxDelayMs: 250 };

    expect([2, 3, 4].map((attempt) => retryDelayMs(cfg, attempt))).toEqual([100, 200, 250]);
  });

  it('retries share failures and logs each retry', async () => {
    const lines: string[] = [];
    let calls = 0;

    const result = await retryDelivery(
      'scx-INV1.json',
      async () => {
        calls++;
        if (calls === 1) throw new EnrollError({ code: 'TRANSPORT_ERROR', message: 'reset' });
        return 'sent';
      },
      { attempts: 3, baseDelayMs: 1 },
      new Logger({ format: 'json', sink: (line) => lines.push(line) })
    );

    expect(result).toBe('sent');
    expect(calls).toBe(2);
    expect(lines.map((line) => JSON.parse(line))).toMatchObject([
      { msg: 'Retrying upload', file: 'scx-INV1.json', attempt: 2, attempts: 3, delayMs: 1, error: 'reset' },
    ]);
  });

  it('does not retry missing configuration', async () => {
    let calls = 0;

    await expect(
      retryDelivery(
        'scx-INV1.json',
        async () => {
          calls++;
          throw new EnrollError({ code: 'CONFIG_MISSING', message: 'Configuration missing' });
        },
        { attempts: 3, baseDelayMs: 1 }
      )
    ).rejects.toMatchObject({ code: 'CONFIG_MISSING' });
    expect(calls).toBe(1);
  });
});

describe('MountedShareClient', () => {
  it('writes under the mounted share', async () => {
    const root = makeTmpDir();
    mkdirSync(join(root, 'enroll'));
    const client = new MountedShareClient(root);

    await client.login('svc-enroll', 'test-secret');
    await client.connectShare('enroll');
    await client.upload(bytes, 'incoming/scx-INV1.json');

    expect(existsSync(join(root, 'enroll', 'incoming', 'scx-INV1.json'))).toBe(true);
  });

  it('fails when the share is not mounted', async () => {
    const client = new MountedShareClient(makeTmpDir());

    await expect(client.connectShare('enroll')).rejects.toBeInstanceOf(EnrollError);
  });

  it('refuses paths that leave the share', async () => {
    const root = makeTmpDir();
    mkdirSync(join(root, 'enroll'));
    const client = new MountedShareClient(root);
    await client.connectShare('enroll');

    await expect(client.upload(bytes, '../escape.json')).rejects.toMatchObject({
      code: 'TRANSPORT_ERROR',
    });
  });
});

describe('UploadSlots', () => {
  it('starts waiting uploads in submission order once a slot frees up', async () => {
    const slots = new UploadSlots(1);
    const started: string[] = [];
    let finishFirst = () => {};

    const first = slots.run(async () => {
      started.push('a');
      await new Promise<void>((resolve) => {
        finishFirst = () => resolve();
      });
    });
    const second = slots.run(async () => {
      started.push('b');
    });
    const third = slots.run(async () => {
      started.push('c');
    });

    await pause(5);
    expect(started).toEqual(['a']);

    finishFirst();
    await Promise.all([first, second, third]);
    expect(started).toEqual(['a', 'b', 'c']);
  });

  it('frees the slot of a failed upload', async () => {
    const slots = new UploadSlots(1);

    await expect(
      slots.run(async () => {
        throw new Error('refused');
      })
    ).rejects.toThrow('refused');
    await expect(slots.run(async () => 'next')).resolves.toBe('next');
  });

  it('rejects a limit below one', () => {
    expect(() => new UploadSlots(0)).toThrow(RangeError);
  });
});

describe('DeliveryLog', () => {
  it('appends entries to the day file and reads them back', async () => {
    const log = new DeliveryLog(join(makeTmpDir(), 'deliveries'));
    const timestamp = new Date('2026-03-02T10:00:00.000Z');

    await log.append({
      timestamp,
      filename: 'scx-INV1.json',
      assetNumber: 'INV1',
      serialNumber: 'SN1',
      success: true,
      message: 'ok',
      testMode: true,
    });
    await log.append({
      timestamp,
      filename: 'scx-INV2.json',
      assetNumber: 'INV2',
      serialNumber: 'SN2',
      success: false,
      message: 'Configuration missing',
      testMode: false,
    });

    const entries = await log.readDay(timestamp);
    expect(entries.map((e) => e.assetNumber)).toEqual(['INV1', 'INV2']);
    expect(entries[0]?.timestamp.getTime()).toBe(timestamp.getTime());
    expect((await log.failures(timestamp)).map((e) => e.filename)).toEqual(['scx-INV2.json']);
  });

  it('keeps concurrent appends in call order', async () => {
    const log = new DeliveryLog(makeTmpDir());
    const timestamp = new Date('2026-03-02T10:00:00.000Z');
    const assets = ['INV1', 'INV2', 'INV3', 'INV4'];

    await Promise.all(
      assets.map((assetNumber) =>
        log.append({
          timestamp,
          filename: `scx-${assetNumber}.json`,
          assetNumber,
          serialNumber: 'SN',
          success: true,
          message: 'ok',
          testMode: true,
        })
      )
    );

    expect((await log.readDay(timestamp)).map((e) => e.assetNumber)).toEqual(assets);
  });

  it('returns nothing for a day without a file', async () => {
    const log = new DeliveryLog(makeTmpDir());

    await expect(log.readDay(new Date('2026-01-01T00:00:00Z'))).resolves.toEqual([]);
  });
});

describe('ShareTransport', () => {
  it('refuses to upload before a share is selected', async () => {
    const transport = new ShareTransport(new RecordingClient());
    const spy = vi.fn();

    await transport.upload(bytes, 'x.json').catch(spy);

    expect(spy).toHaveBeenCalledWith(expect.objectContaining({ message: 'No share selected' }));
  });
});
