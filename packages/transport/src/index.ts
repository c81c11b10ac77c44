/**
 * @mac-enroll/transport
 *
 * Delivers enrollment payload files to a file share, or to local storage
 * in test mode.
 */

export type {
  ShareCredentials,
  FileTransport,
  ShareClient,
  ShareClientFactory,
  SecretStore,
  AuthGate,
  DeliveryResult,
} from './types.js';

export { parseSharePath, remoteFilePath } from './share-path.js';
export type { ShareLocation } from './share-path.js';

export { LocalFileTransport } from './local-transport.js';
export { ShareTransport } from './share-transport.js';
export { MountedShareClient } from './mounted-share-client.js';

export { deliverFile, uploadFile, deliveryFailure } from './deliver-file.js';
export type { DeliveryContext } from './deliver-file.js';

export {
  sendMachines,
  summarizeDeliveries,
  DEFAULT_CONCURRENCY,
} from './upload-dispatcher.js';
export type {
  SendContext,
  SendOutcome,
  SendStatus,
  RecordDelivery,
} from './upload-dispatcher.js';

export { DeliveryLog } from './delivery-log.js';
export type { DeliveryLogEntry } from './delivery-log.js';

export { UploadSlots } from './upload-slots.js';
export { retryDelivery, retryDelayMs, withTimeout, isRetryableDelivery, isTimeout } from './retry.js';
export type { RetryConfig } from './retry.js';
