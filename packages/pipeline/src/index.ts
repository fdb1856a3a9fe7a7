/**
 * @tubemux/pipeline
 *
 * Orchestrates one download run and owns its artifacts.
 */

export {
  DownloadRunner,
  untilAborted,
  type ResolutionPrompt,
  type RunnerOptions,
  type RunRequest,
  type RunResult,
} from './runner.js';

export {
  ArtifactLifecycle,
  temporaryFileName,
  outputFileName,
  OUTPUT_CONTAINER,
  type ArtifactPlan,
  type ArtifactPaths,
} from './lifecycle.js';

export { RunEventBus, type RunEvents, type RunEventName } from './events.js';
