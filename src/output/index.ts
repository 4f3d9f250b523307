export {
  REPORT_VERSION,
  buildJsonReport,
  formatJsonReport,
  writeJsonReport,
  type JsonReport,
  type ReportModule,
  type ReportImport,
} from './json.js';
