import { describe, it, expect } from 'vitest';
import type { Exercise } from '../core/exercises/exercise';
import { Localizer } from '../core/i18n/localizer';
import {
  SCREEN_WIDTH,
  banner,
  centered,
  composeScreen,
  composeSummary,
  composeWelcome,
  formatDuration,
} from '../core/render/screen';

const text = new Localizer('en', {
  title: 'GYM',
  subtitle: 'follow along',
  welcome_title: 'Welcome',
  welcome_subtitle: 'pick one',
  watch_follow: 'Watch',
  tips_header: 'Tips:',
  meditation_complete: 'Done breathing',
  workout_complete: 'Done lifting',
  keep_work: 'Keep it up',
  session_time: 'Time %s',
});

const exercise: Exercise = {
  kind: 'strength',
  name: 'Stub',
  description: 'Fixed output',
  update: () => {},
  render: () => ['<frame a>', '<frame b>'],
  getInstructions: () => 'instructions',
  getTips: () => ['- one tip'],
  getCounter: () => 'Rep: 4',
  isComplete: () => false,
  reset: () => {},
};

describe('Screen layout', () => {
  describe('centered', () => {
    it('should pad to the middle of the screen', () => {
      expect(centered('instructions')).toBe(' '.repeat(24) + 'instructions');
      expect(centered('abc')).toBe(' '.repeat(28) + 'abc');
    });

    it('should not pad text wider than the screen', () => {
      const wide = 'x'.repeat(SCREEN_WIDTH + 1);
      expect(centered(wide)).toBe(wide);
    });
  });

  it('should frame the banner with rules', () => {
    expect(banner(text, 'title', 'subtitle')).toEqual([
      '',
      '='.repeat(60),
      ' '.repeat(20) + 'GYM',
      ' '.repeat(14) + 'follow along',
      '='.repeat(60),
    ]);
  });

  it('should lay out one tick top to bottom', () => {
    const lines = composeScreen(exercise, text);

    expect(lines).toHaveLength(21);
    expect(lines.slice(0, 5)).toEqual(banner(text, 'title', 'subtitle'));
    expect(lines[6]).toBe(' '.repeat(24) + 'instructions');
    expect(lines[9]).toBe(' '.repeat(25) + 'Watch');
    expect(lines.slice(11, 13)).toEqual(['<frame a>', '<frame b>']);
    expect(lines[15]).toBe(' '.repeat(25) + 'Rep: 4');
    expect(lines.slice(17)).toEqual(['-'.repeat(60), 'Tips:', '- one tip', '-'.repeat(60)]);
  });

  it('should summarise the session by exercise kind', () => {
    expect(composeSummary('meditation', text, 61_500)).toEqual(['', 'Done breathing', 'Keep it up', 'Time 01:01', '']);
    expect(composeSummary('strength', text, 0)[1]).toBe('Done lifting');
  });

  it('should greet with the welcome banner', () => {
    expect(composeWelcome(text)).toEqual([...banner(text, 'welcome_title', 'welcome_subtitle'), '']);
  });

  describe('formatDuration', () => {
    it('should print minutes and seconds', () => {
      expect(formatDuration(0)).toBe('00:00');
      expect(formatDuration(59_999)).toBe('00:59');
      expect(formatDuration(61_500)).toBe('01:01');
      expect(formatDuration(3_600_000)).toBe('60:00');
    });

    it('should never go negative', () => {
      expect(formatDuration(-5)).toBe('00:00');
    });
  });
});
