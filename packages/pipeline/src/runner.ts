/**
 * Download Runner
 *
 * Drives one run through the state machine:
 * catalog → selection → retrieval → mux → cleanup.
 *
 * Every stage is a single attempt; only SELECTING loops (re-prompting on an
 * invalid ordinal). On any failure the run ends in FAILED without touching
 * the artifacts already on disk. An aborted signal ends it in CANCELLED.
 */

import { randomUUID } from 'node:crypto';
import {
  RunCancelledError,
  RunStateMachine,
  StreamsUnavailableError,
  type AssetDetails,
  type CleanupFailedError,
  type RunState,
  type RunStateTransition,
  type StreamCatalog,
} from '@tubemux/core';
import {
  RetrievalPipeline,
  availableResolutions,
  resolveDescriptors,
  selectResolution,
} from '@tubemux/acquisition';
import type { Muxer } from '@tubemux/processing';
import { createLogger, type Logger } from '@tubemux/utils';
import { RunEventBus } from './events.js';
import { ArtifactLifecycle } from './lifecycle.js';

/**
 * Asks the user for an ordinal and returns the raw answer
 */
export type ResolutionPrompt = (available: ReadonlyArray<string>) => Promise<string>;

export interface RunnerOptions {
  catalog: StreamCatalog;
  muxer: Pick<Muxer, 'mux'>;
  destinationDir: string;
  retrieval?: RetrievalPipeline;
  audioCodec?: string;
}

export interface RunRequest {
  locator: string;
  promptResolution: ResolutionPrompt;
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  asset: AssetDetails;
  resolution: string;
  outputPath: string;
  cleanupFailures: CleanupFailedError[];
  history: ReadonlyArray<RunStateTransition>;
}

/**
 * Reject as soon as `signal` aborts, without waiting for `promise`
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class DownloadRunner {
  readonly events = new RunEventBus();
  private readonly retrieval: RetrievalPipeline;

  constructor(private readonly options: RunnerOptions) {
    this.retrieval = options.retrieval ?? new RetrievalPipeline();
  }

  async run(request: RunRequest): Promise<RunResult> {
    const runId = randomUUID().slice(0, 8);
    const machine = new RunStateMachine(runId);
    const log = createLogger({ module: 'runner', runId });
    const { signal } = request;

    try {
      signal?.throwIfAborted();
      const entry = await untilAborted(this.options.catalog.resolve(request.locator), signal);
      this.transition(machine, log, 'RESOLVED');
      this.events.emit('asset', entry.asset);

      const available = availableResolutions(entry.descriptors);
      if (available.length === 0) {
        throw new StreamsUnavailableError(['video']);
      }

      this.transition(machine, log, 'SELECTING');
      this.events.emit('resolutions', available);
      const resolution = await this.select(available, request.promptResolution, signal);
      const selection = resolveDescriptors(entry.descriptors, resolution);
      log.debug(
        { resolution, videoItag: selection.video.itag, audioItag: selection.audio.itag },
        'Streams selected'
      );

      const lifecycle = new ArtifactLifecycle({
        destinationDir: this.options.destinationDir,
        assetId: entry.asset.id,
        title: entry.asset.title,
        resolution,
        videoContainer: selection.video.container,
        audioContainer: selection.audio.container,
      });
      const { videoPath, audioPath, outputPath } = lifecycle.paths;

      signal?.throwIfAborted();
      this.transition(machine, log, 'RETRIEVING');
      await this.retrieval.retrieve(selection, lifecycle.paths, {
        signal,
        listener: {
          onStart: (kind, path) => this.events.emit('retrieval:start', { kind, path }),
          onProgress: (kind, progress) => this.events.emit('retrieval:progress', { kind, ...progress }),
          onComplete: (kind, path) => this.events.emit('retrieval:complete', { kind, path }),
        },
      });

      signal?.throwIfAborted();
      this.transition(machine, log, 'MUXING');
      await this.options.muxer.mux({
        videoFile: videoPath,
        audioFile: audioPath,
        outputFile: outputPath,
        audioCodec: this.options.audioCodec,
        signal,
      });

      this.transition(machine, log, 'CLEANING');
      const cleanupFailures = await lifecycle.cleanup();
      for (const failure of cleanupFailures) {
        this.events.emit('cleanup:failed', failure);
      }

      this.transition(machine, log, 'DONE');
      log.info({ outputPath, resolution }, 'Run complete');

      return {
        runId,
        asset: entry.asset,
        resolution,
        outputPath,
        cleanupFailures,
        history: machine.getHistory(),
      };
    } catch (error) {
      throw this.terminate(machine, log, error, signal);
    }
  }

  private async select(
    available: ReadonlyArray<string>,
    prompt: ResolutionPrompt,
    signal?: AbortSignal
  ): Promise<string> {
    for (;;) {
      signal?.throwIfAborted();
      const answer = await untilAborted(prompt(available), signal);
      const choice = selectResolution(available, answer);
      if (choice.ok) {
        return choice.resolution;
      }
      this.events.emit('choice:invalid', choice.error);
    }
  }

  private transition(machine: RunStateMachine, log: Logger, to: RunState): void {
    const transition = machine.transitionTo(to);
    log.debug({ from: transition.from, to: transition.to }, 'State changed');
    this.events.emit('state', transition);
  }

  /**
   * Move the machine into its absorbing state and return the error to throw
   */
  private terminate(machine: RunStateMachine, log: Logger, error: unknown, signal?: AbortSignal): Error {
    const state = machine.getState();

    if (signal?.aborted) {
      const cancelled = new RunCancelledError(state);
      if (machine.canTransitionTo('CANCELLED')) {
        const transition = machine.cancel();
        log.debug({ from: state }, 'Run cancelled');
        this.events.emit('state', transition);
      }
      return cancelled;
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    if (machine.canTransitionTo('FAILED')) {
      const transition = machine.fail(failure);
      log.debug({ from: state, error: failure }, 'Run failed');
      this.events.emit('state', transition);
    }
    return failure;
  }
}
