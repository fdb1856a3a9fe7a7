/**
 * @tubemux/core
 *
 * Core package containing:
 * - Run state machine
 * - Error hierarchy
 * - Stream and asset types
 * - Binary configuration
 */

// State machine
export {
  RUN_STATES,
  RunStateMachine,
  isValidTransition,
  getNextStates,
  type RunState,
  type RunStateTransition,
} from './stateMachine.js';

// Types
export type {
  StreamKind,
  StreamDescriptor,
  VideoStreamDescriptor,
  AudioStreamDescriptor,
  RetrieveFn,
  RetrieveOptions,
  RetrievalProgress,
  Selection,
  AssetDetails,
  CatalogEntry,
  StreamCatalog,
} from './types/stream.js';

// Errors
export {
  TubemuxError,
  AssetUnavailableError,
  InvalidChoiceError,
  StreamsUnavailableError,
  RetrievalFailedError,
  MuxFailedError,
  CleanupFailedError,
  RunCancelledError,
  StateTransitionError,
  type PipelineStage,
  type InvalidChoiceReason,
} from './errors/index.js';

// Binary Configuration
export {
  resolveBinaryPath,
  type BinaryConfig,
  type BinaryLookup,
} from './config/binaries.js';
