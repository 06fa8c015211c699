import { DEFAULT_TIMEFRAME, type Timeframe } from "../lib/verdict-taxonomy";

export type Subscriber<V> = (value: V) => void;

/**
 * Observable key/value state. Subscribers for a key run synchronously in
 * registration order after each write; one that throws is logged and the
 * rest still run.
 */
export class SessionState<S extends object> {
  private values: S;
  private subscribers: { [K in keyof S]?: Subscriber<S[K]>[] } = {};

  constructor(initial: S) {
    this.values = { ...initial };
  }

  get<K extends keyof S>(key: K): S[K] {
    return this.values[key];
  }

  snapshot(): Readonly<S> {
    return { ...this.values };
  }

  subscribe<K extends keyof S>(key: K, callback: Subscriber<S[K]>): () => void {
    const bucket = this.subscribers[key] ?? [];
    if (!bucket.includes(callback)) bucket.push(callback);
    this.subscribers[key] = bucket;
    return () => this.unsubscribe(key, callback);
  }

  unsubscribe<K extends keyof S>(key: K, callback: Subscriber<S[K]>): void {
    const bucket = this.subscribers[key];
    if (!bucket) return;
    const idx = bucket.indexOf(callback);
    if (idx !== -1) bucket.splice(idx, 1);
  }

  set<K extends keyof S>(key: K, value: S[K]): void {
    this.values[key] = value;
    this.notify(key, value);
  }

  /** Writes every field first, then notifies each changed key once with its final value. */
  batchSet(patch: Partial<S>): void {
    const keys = Object.keys(patch) as (keyof S)[];
    this.values = { ...this.values, ...patch };
    for (const key of keys) {
      this.notify(key, this.values[key]);
    }
  }

  private notify<K extends keyof S>(key: K, value: S[K]): void {
    const bucket = [...(this.subscribers[key] ?? [])];
    for (const callback of bucket) {
      try {
        callback(value);
      } catch (err: unknown) {
        console.error(`[session-state] subscriber for "${String(key)}" threw:`, err);
      }
    }
  }
}

export interface ImportProgressSnapshot {
  processed: number;
  total: number;
}

export interface AppSessionFields {
  timeframe: Timeframe;
  sessionId: number | null;
  importInProgress: boolean;
  lastProgress: ImportProgressSnapshot | null;
}

export function createAppSessionState(): SessionState<AppSessionFields> {
  return new SessionState<AppSessionFields>({
    timeframe: DEFAULT_TIMEFRAME,
    sessionId: null,
    importInProgress: false,
    lastProgress: null,
  });
}
