/**
 * Animation Loop
 *
 * Single consumer of two event sources: a fixed-period tick and an abort
 * signal. The wait for whichever comes first is the only suspension point,
 * so exercise state has exactly one writer. On abort the loop stops before
 * the next tick and renders one final clear + summary.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Exercise } from '../exercises/exercise';
import type { TextProvider } from '../i18n/localizer';
import { composeScreen, composeSummary } from '../render/screen';
import type { Renderer } from '../render/terminal';
import { createSessionStore, type SessionStore } from '../../state/sessionStore';

export interface TickScheduler {
  now(): number;
  /** Resolves true at the deadline, false if the signal aborts first. */
  waitUntil(deadline: number, signal: AbortSignal): Promise<boolean>;
}

export const timerScheduler: TickScheduler = {
  now: () => performance.now(),

  async waitUntil(deadline, signal) {
    if (signal.aborted) return false;
    try {
      await sleep(Math.max(0, deadline - performance.now()), undefined, { signal });
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  },
};

export interface AnimationLoopOptions {
  fps: number;
  scheduler?: TickScheduler;
  store?: SessionStore;
}

export type LoopResult = {
  ticks: number;
  elapsedMs: number;
};

export class AnimationLoop {
  private readonly periodMs: number;
  private readonly scheduler: TickScheduler;
  private readonly store: SessionStore;

  constructor(
    private readonly exercise: Exercise,
    private readonly text: TextProvider,
    private readonly renderer: Renderer,
    options: AnimationLoopOptions
  ) {
    if (!Number.isFinite(options.fps) || options.fps <= 0) {
      throw new Error(`fps must be a positive number (got ${options.fps})`);
    }
    this.periodMs = 1000 / options.fps;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.store = options.store ?? createSessionStore();
  }

  getStore(): SessionStore {
    return this.store;
  }

  async run(signal: AbortSignal): Promise<LoopResult> {
    this.exercise.reset();
    this.store.getState().startSession(this.exercise.kind, this.scheduler.now());

    let deadline = this.scheduler.now() + this.periodMs;

    while (!signal.aborted) {
      const ticked = await this.scheduler.waitUntil(deadline, signal);
      if (!ticked || signal.aborted) break;

      this.tick();
      if (this.exercise.isComplete()) break;

      // A late tick is not replayed
      deadline = Math.max(deadline + this.periodMs, this.scheduler.now());
    }

    return this.finish();
  }

  private tick() {
    this.exercise.update();
    this.store.getState().recordTick();

    this.renderer.clear();
    this.renderer.print(composeScreen(this.exercise, this.text));
  }

  private finish(): LoopResult {
    const now = this.scheduler.now();
    const session = this.store.getState();
    session.stopSession(now);

    const elapsedMs = this.store.getState().getElapsedMs(now);
    this.renderer.clear();
    this.renderer.print(composeSummary(this.exercise.kind, this.text, elapsedMs));

    return { ticks: this.store.getState().ticks, elapsedMs };
  }
}
