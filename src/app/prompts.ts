import { createInterface } from 'node:readline/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { parseExerciseKind } from '../core/exercises';
import type { TextProvider } from '../core/i18n/localizer';
import type { ExerciseKind } from '../core/models/types';
import { composeWelcome } from '../core/render/screen';
import type { Renderer } from '../core/render/terminal';

export interface LineReader {
  question(prompt: string, options: { signal: AbortSignal }): Promise<string>;
  /** Emitted when the input ends or the reader is closed. */
  once(event: 'close', listener: () => void): unknown;
  close(): void;
}

/**
 * readline swallows Ctrl+C while it owns stdin; forward it as an interrupt.
 */
export function stdinReader(onInterrupt: () => void): LineReader {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', onInterrupt);
  return rl;
}

/**
 * Ask until the answer names an exercise. Resolves null when interrupted
 * or when the input ends first.
 */
export async function selectExercise(
  text: TextProvider,
  renderer: Renderer,
  reader: LineReader,
  signal: AbortSignal
): Promise<ExerciseKind | null> {
  renderer.clear();
  renderer.print([
    ...composeWelcome(text),
    text.lookup('exercise_selection'),
    text.lookup('exercise_buttock'),
    text.lookup('exercise_meditation'),
    '',
  ]);

  // A pending question is left unsettled when the input ends
  let inputEnded = false;
  const ended = new Promise<null>((resolve) => {
    reader.once('close', () => {
      inputEnded = true;
      resolve(null);
    });
  });

  try {
    let prompt = text.lookup('enter_choice');
    for (;;) {
      if (inputEnded) return null;

      let answer: string | null;
      try {
        answer = await Promise.race([reader.question(prompt, { signal }), ended]);
      } catch (err) {
        if (signal.aborted) return null;
        throw err;
      }
      if (answer === null) return null;

      const kind = parseExerciseKind(answer);
      if (kind) return kind;
      prompt = `${text.lookup('invalid_choice')}\n${text.lookup('enter_choice')}`;
    }
  } finally {
    reader.close();
  }
}

export async function countdown(
  text: TextProvider,
  renderer: Renderer,
  seconds: number,
  signal: AbortSignal,
  wait: (ms: number, signal: AbortSignal) => Promise<void> = (ms, s) => sleep(ms, undefined, { signal: s })
): Promise<boolean> {
  renderer.clear();
  renderer.print([
    ...composeWelcome(text),
    text.lookup('starting_countdown'),
    text.lookup('prepare_message'),
  ]);

  try {
    for (let i = seconds; i > 0; i--) {
      renderer.print([text.lookupFormatted('starting_in', i)]);
      await wait(1000, signal);
    }
    renderer.print(['', text.lookup('lets_begin')]);
    if (seconds > 0) await wait(1000, signal);
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
  return !signal.aborted;
}
