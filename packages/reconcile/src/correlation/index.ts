export {
  SERIAL_SUFFIX_LENGTH,
  serialSuffix,
  buildSerialIndex,
  correlateSerials,
} from './serial-correlator.js';
