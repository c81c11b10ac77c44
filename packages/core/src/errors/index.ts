export { EnrollError, wrapError, errorMessage } from './enroll-error.js';
export type { EnrollErrorCode, EnrollErrorDetails } from './enroll-error.js';
