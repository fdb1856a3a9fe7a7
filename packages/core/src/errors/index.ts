/**
 * Custom Error Classes
 */

import type { RunState } from '../stateMachine.js';
import type { StreamKind } from '../types/stream.js';

/**
 * Pipeline stage an error originates from
 */
export type PipelineStage = 'catalog' | 'selection' | 'retrieval' | 'mux' | 'cleanup' | 'run';

/**
 * Base error class for all tubemux errors
 */
export class TubemuxError extends Error {
  public readonly code: string;
  public readonly stage: PipelineStage;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    stage: PipelineStage,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TubemuxError';
    this.code = code;
    this.stage = stage;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The catalog could not resolve the locator
 */
export class AssetUnavailableError extends TubemuxError {
  constructor(locator: string, cause?: unknown) {
    super(
      `Could not resolve asset: ${locator}`,
      'ASSET_UNAVAILABLE',
      'catalog',
      { locator, reason: cause instanceof Error ? cause.message : undefined },
      { cause }
    );
    this.name = 'AssetUnavailableError';
  }
}

export type InvalidChoiceReason = 'malformed' | 'out-of-range';

/**
 * Recoverable: the selection prompt asks again
 */
export class InvalidChoiceError extends TubemuxError {
  public readonly reason: InvalidChoiceReason;

  constructor(input: string, reason: InvalidChoiceReason, optionCount: number) {
    super(
      reason === 'malformed'
        ? `Not a number: ${input}`
        : `Choice ${input.trim()} is outside 1-${optionCount}`,
      'INVALID_CHOICE',
      'selection',
      { input, reason, optionCount }
    );
    this.name = 'InvalidChoiceError';
    this.reason = reason;
  }
}

/**
 * No matching video or audio descriptor after filtering
 */
export class StreamsUnavailableError extends TubemuxError {
  constructor(missing: StreamKind[], resolution?: string) {
    super(
      `No ${missing.join(' or ')} stream available` +
        (resolution ? ` for ${resolution}` : ''),
      'STREAMS_UNAVAILABLE',
      'selection',
      { missing, resolution }
    );
    this.name = 'StreamsUnavailableError';
  }
}

/**
 * Network or IO failure while downloading a descriptor
 */
export class RetrievalFailedError extends TubemuxError {
  constructor(kind: StreamKind, path: string, cause?: unknown) {
    super(
      `Failed to download ${kind} stream` +
        (cause instanceof Error ? `: ${cause.message}` : ''),
      'RETRIEVAL_FAILED',
      'retrieval',
      { kind, path },
      { cause }
    );
    this.name = 'RetrievalFailedError';
  }
}

/**
 * The multiplexer exited non-zero or could not be launched
 */
export class MuxFailedError extends TubemuxError {
  public readonly diagnostics: string;

  constructor(
    command: string,
    exitCode: number | null,
    diagnostics: string,
    cause?: unknown
  ) {
    super(
      exitCode === null
        ? `Could not launch ${command}` + (cause instanceof Error ? `: ${cause.message}` : '')
        : `${command} exited with code ${exitCode}`,
      'MUX_FAILED',
      'mux',
      { command, exitCode, diagnostics: diagnostics.substring(diagnostics.length - 2000) },
      { cause }
    );
    this.name = 'MuxFailedError';
    this.diagnostics = diagnostics;
  }
}

/**
 * A temporary artifact could not be removed after a successful mux
 */
export class CleanupFailedError extends TubemuxError {
  constructor(path: string, cause?: unknown) {
    super(
      `Could not remove ${path}` + (cause instanceof Error ? `: ${cause.message}` : ''),
      'CLEANUP_FAILED',
      'cleanup',
      { path },
      { cause }
    );
    this.name = 'CleanupFailedError';
  }
}

/**
 * The run was interrupted by the user
 */
export class RunCancelledError extends TubemuxError {
  constructor(state: RunState) {
    super('Operation cancelled by user', 'RUN_CANCELLED', 'run', { state });
    this.name = 'RunCancelledError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TubemuxError {
  constructor(runId: string, fromState: RunState, toState: RunState) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      'run',
      { runId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}
