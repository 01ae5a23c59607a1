/**
 * @module output
 * @description Report output exports
 */

export { CsvReportWriter, MemoryReportSink, toRecord, type ReportSink } from './report-writer';
