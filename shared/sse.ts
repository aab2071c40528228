import type { StageEvent } from './types';

/** `client` when the connection dropped before the run finished. */
export type SseCloseReason = 'client' | 'server';

export interface SseStreamOptions {
  /** A heartbeat comment is written after this long without any frame. */
  heartbeatMs: number;
  onClose?: (reason: SseCloseReason) => void;
}

export interface SseStream {
  /** Aborted when the client disconnects or the stream is closed; cancels the run. */
  controller: AbortController;
  send: <T>(event: StageEvent<T>) => void;
  sendJson: (eventName: string, payload: unknown) => void;
  close: () => void;
}
