// Report module exports
export { renderReport, writeReport, ReportCounts } from './ReportWriter';
