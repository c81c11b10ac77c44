export {
  assembleRecord,
  createManualRecord,
  defaultIdGenerator,
} from './record-assembler.js';
export type { IdGenerator } from './record-assembler.js';
export {
  LOCATION_GROUP_BY_DEVICE_TYPE,
  FALLBACK_DEVICE_TYPE,
  isDeviceType,
  locationGroupForDeviceType,
} from './device-type.js';
