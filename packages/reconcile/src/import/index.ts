export { EnrollmentImporter, createEnrollmentImporter } from './enrollment-importer.js';
export type {
  ReconcileTables,
  ImportPaths,
  EnrollmentImporterOptions,
} from './enrollment-importer.js';
