export { RefinementPipeline, INITIAL_STRATEGY } from './refinement-pipeline.js';
export type { RefinementPipelineDeps, PipelineRunOptions } from './refinement-pipeline.js';
export { formatRunReport, formatRunReportJson } from './report-formatter.js';
export type { ReportFormatOptions } from './report-formatter.js';
