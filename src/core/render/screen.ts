import { completionKey, type Exercise } from '../exercises/exercise';
import type { TextProvider } from '../i18n/localizer';
import type { ExerciseKind } from '../models/types';

export const SCREEN_WIDTH = 60;

const rule = (char: string) => char.repeat(SCREEN_WIDTH);
const indent = (n: number, text: string) => ' '.repeat(n) + text;

export function centered(text: string, width = SCREEN_WIDTH): string {
  return indent(Math.max(0, Math.trunc((width - text.length) / 2)), text);
}

export function banner(text: TextProvider, titleKey: string, subtitleKey: string): string[] {
  return ['', rule('='), indent(20, text.lookup(titleKey)), indent(14, text.lookup(subtitleKey)), rule('=')];
}

/**
 * Full frame for one tick: banner, instruction, animation, counter, tips.
 */
export function composeScreen(exercise: Exercise, text: TextProvider): string[] {
  return [
    ...banner(text, 'title', 'subtitle'),
    '',
    centered(exercise.getInstructions()),
    '',
    '',
    indent(25, text.lookup('watch_follow')),
    '',
    ...exercise.render(),
    '',
    '',
    indent(25, exercise.getCounter()),
    '',
    rule('-'),
    text.lookup('tips_header'),
    ...exercise.getTips(),
    rule('-'),
  ];
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export function composeSummary(kind: ExerciseKind, text: TextProvider, elapsedMs: number): string[] {
  return [
    '',
    text.lookup(completionKey(kind)),
    text.lookup('keep_work'),
    text.lookupFormatted('session_time', formatDuration(elapsedMs)),
    '',
  ];
}

export function composeWelcome(text: TextProvider): string[] {
  return [
    ...banner(text, 'welcome_title', 'welcome_subtitle'),
    '',
  ];
}
