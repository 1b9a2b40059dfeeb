export {
  ReportWriter,
  REPORT_HEADER,
  DEFAULT_TOTAL_DENOMINATOR,
  formatScore,
  formatTotal,
} from './csv-writer.js';
export type { ReportWriterOptions, ReportRow } from './csv-writer.js';
