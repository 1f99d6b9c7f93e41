export { BackendError, isBackendError, type BackendErrorCode } from "./core/errors.js";
export { newRunId, isRunId, type RunId } from "./core/ids.js";
export { Backend, preferSet, TEST_MODE_QUESTION } from "./backends/base.js";
export { SlurmBackend } from "./backends/slurm.js";
export { LocalBackend } from "./backends/local.js";
export { createBackend, type AnyBackend } from "./backends/index.js";
export { isCommandAvailable, ReadlinePrompt } from "./backends/commands.js";
export {
  ensureInterpreter,
  renderContainerGuard,
  injectContainerGuard,
  findGuardInsertionIndex,
  isDirectiveLine,
  type ContainerEngine,
  type ContainerGuardOptions
} from "./backends/scriptGuard.js";
export type * from "./backends/types.js";
export { JobCollection, type NewJob } from "./jobs/jobCollection.js";
export type * from "./jobs/types.js";
export { ProgressReporter, type ProgressReporterOptions, type RenderStrategy } from "./progress/reporter.js";
export { OraBarDisplay, type BarDisplay, type BarDisplayFactory } from "./progress/barDisplay.js";
export { summarizeJobs, formatSummary, type JobSummary, type SummaryBucket } from "./progress/summary.js";
export { createScriptWorkspace, type ScriptWorkspace } from "./execution/workspace.js";
export { loadProjectConfig, parseProjectConfig, defaultBackends, type ProjectConfig } from "./config/config.js";
