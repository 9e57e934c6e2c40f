import { describe, it, expect, beforeEach } from 'vitest';
import { createSessionStore, type SessionStore } from '../state/sessionStore';

describe('Session store', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = createSessionStore();
  });

  it('should start idle', () => {
    expect(store.getState()).toMatchObject({
      status: 'idle',
      exercise: null,
      ticks: 0,
      startedAt: null,
      stoppedAt: null,
    });
    expect(store.getState().getElapsedMs(5_000)).toBe(0);
  });

  it('should count ticks while running', () => {
    store.getState().startSession('meditation', 1_000);
    store.getState().recordTick();
    store.getState().recordTick();

    expect(store.getState()).toMatchObject({ status: 'running', exercise: 'meditation', ticks: 2 });
    expect(store.getState().getElapsedMs(1_750)).toBe(750);
  });

  it('should freeze elapsed time once stopped', () => {
    store.getState().startSession('strength', 1_000);
    store.getState().stopSession(4_000);

    expect(store.getState().status).toBe('stopped');
    expect(store.getState().getElapsedMs(10_000)).toBe(3_000);
  });

  it('should ignore a stop when not running', () => {
    store.getState().stopSession(4_000);
    expect(store.getState()).toMatchObject({ status: 'idle', stoppedAt: null });

    store.getState().startSession('strength', 0);
    store.getState().stopSession(100);
    store.getState().stopSession(900);
    expect(store.getState().stoppedAt).toBe(100);
  });

  it('should restart tick counting on a new session', () => {
    store.getState().startSession('strength', 0);
    store.getState().recordTick();
    store.getState().startSession('meditation', 50);

    expect(store.getState()).toMatchObject({ exercise: 'meditation', ticks: 0, startedAt: 50 });
  });

  it('should notify subscribers', () => {
    const statuses: string[] = [];
    const unsubscribe = store.subscribe((state) => statuses.push(state.status));

    store.getState().startSession('strength', 0);
    store.getState().stopSession(10);
    unsubscribe();
    store.getState().startSession('meditation', 20);

    expect(statuses).toEqual(['running', 'stopped']);
    expect(store.getState().status).toBe('running');
  });
});
