import type { Grid, PipelineState, Seed, StageDescriptor } from '../types/index.js';

export interface StageCompletedEvent {
  index: number;        // position in the stage list
  stage: StageDescriptor;
  state: PipelineState;
  grid: Grid;
  landCells: number;
}

export interface FinalizedEvent {
  seed: Seed;
  grid: Grid;
  landCells: number;
  draws: number;        // values taken from the RandomStream during the run
}

export type PipelineEventMap = {
  stageCompleted: StageCompletedEvent;
  finalized: FinalizedEvent;
};

type Listener<TPayload> = (payload: TPayload) => void;

type ListenerBuckets<TEventMap> = {
  [TKey in keyof TEventMap]?: Set<Listener<TEventMap[TKey]>>;
};

export class EventBus<TEventMap> {
  private readonly listeners: ListenerBuckets<TEventMap> = {};

  /** Subscribe; the returned function removes the listener. */
  on<TKey extends keyof TEventMap>(eventName: TKey, listener: Listener<TEventMap[TKey]>): () => void {
    const bucket = this.listeners[eventName] ?? new Set<Listener<TEventMap[TKey]>>();
    bucket.add(listener);
    this.listeners[eventName] = bucket;

    return () => {
      bucket.delete(listener);
      if (bucket.size === 0 && this.listeners[eventName] === bucket) {
        delete this.listeners[eventName];
      }
    };
  }

  emit<TKey extends keyof TEventMap>(eventName: TKey, payload: TEventMap[TKey]): void {
    const bucket = this.listeners[eventName];
    if (!bucket) return;

    for (const listener of bucket) {
      listener(payload);
    }
  }
}
