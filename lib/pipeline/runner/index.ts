/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer that runs the pipeline stages for one
 * conversion job with tools and progress tracking.
 */

export {
  type Progress,
  type ProgressEvent,
  type JobRunnerDeps,
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  formatStageName,
} from "./types";

export { runConversionJob } from "./job-runner";

export {
  type JobStreamEvent,
  isResultEvent,
  jobResult,
  observeConversionJob,
} from "./observe";
