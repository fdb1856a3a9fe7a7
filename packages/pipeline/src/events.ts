/**
 * Run Events
 *
 * Discrete lifecycle events published by a run. Presentation subscribes to
 * these; the pipeline never touches the console.
 */

import { EventEmitter } from 'node:events';
import type {
  AssetDetails,
  CleanupFailedError,
  InvalidChoiceError,
  RunStateTransition,
  StreamKind,
} from '@tubemux/core';

export interface RunEvents {
  state: RunStateTransition;
  asset: AssetDetails;
  resolutions: ReadonlyArray<string>;
  'choice:invalid': InvalidChoiceError;
  'retrieval:start': { kind: StreamKind; path: string };
  'retrieval:progress': { kind: StreamKind; downloadedBytes: number; totalBytes?: number };
  'retrieval:complete': { kind: StreamKind; path: string };
  'cleanup:failed': CleanupFailedError;
}

export type RunEventName = keyof RunEvents;

export class RunEventBus {
  private emitter = new EventEmitter();

  on<K extends RunEventName>(event: K, listener: (payload: RunEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends RunEventName>(event: K, listener: (payload: RunEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  emit<K extends RunEventName>(event: K, payload: RunEvents[K]): void {
    this.emitter.emit(event, payload);
  }
}
