export {
  encodePayload,
  serializePayload,
  payloadFileName,
  decodePayload,
} from './payload-encoder.js';
export type { BooleanEncoding, PayloadOptions, EnrollmentPayload } from './payload-encoder.js';
