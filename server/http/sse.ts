import type { SseCloseReason, SseStream, SseStreamOptions } from '../../shared/sse';

/** The slice of an Express response the event stream writes to. */
export interface SseResponse {
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'close', listener: () => void): unknown;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

const STAGE_EVENT = 'stage-event';

export const formatFrame = (eventName: string, payload: unknown): string => {
  const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
  // Multi-line payloads need one data field per line.
  const lines = data.split('\n').map((line) => `data: ${line}`);
  return `event: ${eventName}\n${lines.join('\n')}\n\n`;
};

/**
 * Event stream for one enrichment run. Stage events double as keep-alives;
 * the heartbeat comment is only written while the run is quiet. A dropped
 * connection aborts `controller`, which the pipeline polls between URLs.
 */
export const createSseStream = (res: SseResponse, options: SseStreamOptions): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  const controller = new AbortController();
  let closed = false;
  let lastWriteAt = Date.now();

  const isWritable = () => !closed && !res.writableEnded && !res.destroyed;

  const write = (chunk: string) => {
    if (!isWritable()) return;
    res.write(chunk);
    lastWriteAt = Date.now();
  };

  const heartbeat = setInterval(() => {
    if (Date.now() - lastWriteAt >= options.heartbeatMs) {
      write(': heartbeat\n\n');
    }
  }, options.heartbeatMs);

  const shutdown = (reason: SseCloseReason) => {
    if (closed) return;
    closed = true;
    clearInterval(heartbeat);
    controller.abort();
    if (!res.writableEnded) {
      res.end();
    }
    options.onClose?.(reason);
  };

  res.on('close', () => shutdown('client'));

  return {
    controller,
    send: (event) => write(formatFrame(STAGE_EVENT, event)),
    sendJson: (eventName, payload) => write(formatFrame(eventName, payload)),
    close: () => shutdown('server'),
  };
};
