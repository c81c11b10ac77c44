export { formatImportReport } from './import-formatter.js';
