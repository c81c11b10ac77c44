/**
 * Share Transport
 *
 * FileTransport over an injected ShareClient. Client failures surface as
 * TRANSPORT_ERROR.
 */

import { EnrollError, errorMessage } from '@mac-enroll/core';
import type { FileTransport, ShareClient, ShareCredentials } from './types.js';

async function call<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof EnrollError) throw error;
    throw new EnrollError({
      code: 'TRANSPORT_ERROR',
      message: `${action} failed: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export class ShareTransport implements FileTransport {
  private shareSelected = false;

  constructor(private readonly client: ShareClient) {}

  async connect(host: string, credentials: ShareCredentials): Promise<void> {
    await call(`Login to ${host}`, () =>
      this.client.login(credentials.username, credentials.password)
    );
  }

  async selectShare(name: string): Promise<void> {
    await call(`Connecting share ${name}`, () => this.client.connectShare(name));
    this.shareSelected = true;
  }

  async upload(bytes: Uint8Array, path: string, signal?: AbortSignal): Promise<void> {
    if (!this.shareSelected) {
      throw new EnrollError({
        code: 'TRANSPORT_ERROR',
        message: 'No share selected',
      });
    }
    await call(`Upload of ${path}`, () => this.client.upload(bytes, path, signal));
  }

  async disconnect(): Promise<void> {
    if (!this.shareSelected) return;
    this.shareSelected = false;
    await call('Disconnect', () => this.client.disconnectShare());
  }
}
