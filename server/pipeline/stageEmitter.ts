export type { StageEvent, StageName, StageStatus } from '../../shared/types';

import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

const nowIso = () => new Date().toISOString();

export interface StageEmitter {
  start: <T>(payload?: { message?: string; data?: T }) => void;
  progress: <T>(payload?: { message?: string; data?: T }) => void;
  success: <T>(payload?: { message?: string; data?: T }) => void;
  failure: (error: unknown, options?: { data?: unknown }) => void;
}

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender): StageEmitter => {
  const emit =
    (status: StageStatus) =>
    <T>(payload?: { message?: string; data?: T }) => {
      send({ runId, stage, status, message: payload?.message, data: payload?.data, ts: nowIso() });
    };

  return {
    start: emit('start'),
    progress: emit('progress'),
    success: emit('success'),
    failure: (error, options) => {
      const message = error instanceof Error ? error.message : String(error);
      send({
        runId,
        stage,
        status: 'failure',
        message,
        data: options?.data ?? { error: message },
        ts: nowIso(),
      });
    },
  };
};
