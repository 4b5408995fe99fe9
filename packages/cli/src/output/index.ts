export { formatMarkdown, getStatusBadge, formatPercent, formatDate, type MarkdownFormatOptions } from './markdown.js';
export { formatJson, buildJsonOutput, type JsonFormatOptions, type JsonOutput, type JsonRecordOutput } from './json.js';
export { formatAuditChecklist, checkbox, truncate, type ChecklistFormatOptions } from './checklist.js';
export { formatEvaluation, type EvaluationFormatOptions } from './evaluation.js';
export { writeReport, resolveFilename, getExtension, type WriteReportOptions } from './writer.js';
