export {
  runPipeline,
  type PipelineOptions,
  type RunOutcome,
  type DeduplicationSummary
} from './run.js';
export { formatRunSummary } from './summary.js';
