export { renderReport, exportReport, DEFAULT_REPORT_FILE } from './report-exporter.js';
