export { buildJsonReport, countFindings } from "./json-reporter.js";
export { renderTextReport } from "./text-reporter.js";
export type { TextRenderOptions } from "./text-reporter.js";
export { renderSarifReport } from "./sarif-reporter.js";
export type { SarifRenderOptions } from "./sarif-reporter.js";
export type {
  JsonReport,
  ReportFormat,
  ReportMeta,
  ScanMetadata,
  ServiceSection,
  SummaryCounts,
  SummaryInfo,
  TargetInfo,
  ToolInfo,
} from "./types.js";
