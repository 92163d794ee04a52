export { ReportWriter, createReport, parseReport, serializeReport } from './report.js';
