/**
 * Transport Types
 *
 * Collaborators of the delivery layer. Network protocols are not
 * implemented here; a ShareClient is injected.
 */

import type { EnrollErrorCode } from '@mac-enroll/core';

export interface ShareCredentials {
  username: string;
  password: string;
}

/**
 * One delivery session: connect, pick a share, upload, disconnect
 */
export interface FileTransport {
  connect(host: string, credentials: ShareCredentials): Promise<void>;
  selectShare(name: string): Promise<void>;
  /** Write `bytes` to `path`, relative to the selected share; stops early once `signal` aborts */
  upload(bytes: Uint8Array, path: string, signal?: AbortSignal): Promise<void>;
  disconnect(): Promise<void>;
}

/**
 * Minimal file-share client, shaped after common SMB client libraries
 */
export interface ShareClient {
  login(username: string, password: string): Promise<void>;
  connectShare(name: string): Promise<void>;
  upload(content: Uint8Array, path: string, signal?: AbortSignal): Promise<void>;
  disconnectShare(): Promise<void>;
}

export type ShareClientFactory = (host: string) => ShareClient;

/**
 * Stored share credentials, keyed by service name
 */
export interface SecretStore {
  get(service: string): Promise<ShareCredentials | undefined>;
  set(service: string, credentials: ShareCredentials): Promise<void>;
  clear(service: string): Promise<void>;
}

/** Confirms the operator before anything is sent */
export interface AuthGate {
  challenge(reason: string): Promise<boolean>;
}

export interface DeliveryResult {
  success: boolean;
  message: string;
  /** Set on failure */
  code?: EnrollErrorCode;
}
