/**
 * Mounted Share Client
 *
 * ShareClient for shares the operating system has already mounted
 * (e.g. /Volumes/<share> on macOS). Authentication belongs to the mount,
 * so login only checks that credentials were supplied.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { EnrollError } from '@mac-enroll/core';
import type { ShareClient } from './types.js';
import { resolveInside, writeBytes } from './local-transport.js';

export class MountedShareClient implements ShareClient {
  private shareRoot: string | null = null;

  constructor(private readonly mountRoot: string) {}

  async login(username: string, _password: string): Promise<void> {
    if (!username) {
      throw new EnrollError({
        code: 'AUTHENTICATION_FAILED',
        message: 'Share username is empty',
      });
    }
  }

  async connectShare(name: string): Promise<void> {
    const root = join(this.mountRoot, name);
    const info = await stat(root).catch(() => null);
    if (!info?.isDirectory()) {
      throw new EnrollError({
        code: 'TRANSPORT_ERROR',
        message: `Share ${name} is not mounted under ${this.mountRoot}`,
        suggestion: 'Mount the share first, or set delivery.mountRoot.',
      });
    }
    this.shareRoot = root;
  }

  async upload(content: Uint8Array, path: string, signal?: AbortSignal): Promise<void> {
    if (!this.shareRoot) {
      throw new EnrollError({ code: 'TRANSPORT_ERROR', message: 'No share connected' });
    }
    await writeBytes(resolveInside(this.shareRoot, path), content, signal);
  }

  async disconnectShare(): Promise<void> {
    this.shareRoot = null;
  }
}
