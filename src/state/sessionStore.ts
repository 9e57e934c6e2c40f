import { createStore } from 'zustand/vanilla';
import type { ExerciseKind } from '../core/models/types';

export type SessionStatus = 'idle' | 'running' | 'stopped';

export interface SessionState {
  status: SessionStatus;
  exercise: ExerciseKind | null;
  ticks: number;
  startedAt: number | null;
  stoppedAt: number | null;

  startSession: (exercise: ExerciseKind, now: number) => void;
  recordTick: () => void;
  stopSession: (now: number) => void;
  getElapsedMs: (now: number) => number;
}

export type SessionStore = ReturnType<typeof createSessionStore>;

export const createSessionStore = () => createStore<SessionState>((set, get) => ({
  status: 'idle',
  exercise: null,
  ticks: 0,
  startedAt: null,
  stoppedAt: null,

  startSession: (exercise, now) => set({
    status: 'running',
    exercise,
    ticks: 0,
    startedAt: now,
    stoppedAt: null,
  }),

  recordTick: () => set((state) => ({ ticks: state.ticks + 1 })),

  stopSession: (now) => {
    if (get().status !== 'running') return;
    set({ status: 'stopped', stoppedAt: now });
  },

  getElapsedMs: (now) => {
    const { startedAt, stoppedAt } = get();
    if (startedAt === null) return 0;
    return Math.max(0, (stoppedAt ?? now) - startedAt);
  },
}));
