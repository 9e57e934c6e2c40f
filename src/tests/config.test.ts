import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  DEFAULT_ANIMATION_CONFIG,
  createAnimationConfig,
  validateAnimationConfig,
} from '../core/config/animation';
import { DEFAULT_LOCALES_DIR, loadAppConfig } from '../core/config/appConfig';

describe('Animation config', () => {
  it('should ship the tuned defaults', () => {
    expect(DEFAULT_ANIMATION_CONFIG).toEqual({
      fps: 30,
      angularFrequency: 4,
      dampingRatio: 0.3,
      range: 8,
      settleThreshold: 0.5,
    });
    expect(Object.isFrozen(DEFAULT_ANIMATION_CONFIG)).toBe(true);
    expect(validateAnimationConfig(DEFAULT_ANIMATION_CONFIG)).toBeNull();
  });

  it('should build the defaults when given no overrides', () => {
    expect(createAnimationConfig()).toEqual(DEFAULT_ANIMATION_CONFIG);
  });

  it('should merge overrides onto the defaults', () => {
    const config = createAnimationConfig({ fps: 60 });

    expect(config.fps).toBe(60);
    expect(config.range).toBe(8);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should name the offending field', () => {
    expect(() => createAnimationConfig({ fps: 0 })).toThrow('Invalid animation config: fps');
    expect(() => createAnimationConfig({ range: -1 })).toThrow('range must be a positive number (got -1)');
    expect(() => createAnimationConfig({ settleThreshold: 0 })).toThrow('settleThreshold');
    expect(() => createAnimationConfig({ dampingRatio: -0.1 })).toThrow('dampingRatio');
  });
});

describe('loadAppConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use defaults for an empty environment', () => {
    expect(loadAppConfig({})).toEqual({
      language: 'en',
      localesDir: DEFAULT_LOCALES_DIR,
      countdownSeconds: 3,
    });
  });

  it('should read overrides from the environment', () => {
    expect(loadAppConfig({
      TERMGYM_LANG: 'zh',
      TERMGYM_LOCALES_DIR: '/tmp/locales',
      TERMGYM_COUNTDOWN_SECONDS: '0',
    })).toEqual({
      language: 'zh',
      localesDir: '/tmp/locales',
      countdownSeconds: 0,
    });
  });

  it('should warn and keep the default countdown for bad values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(loadAppConfig({ TERMGYM_COUNTDOWN_SECONDS: 'soon' }).countdownSeconds).toBe(3);
    expect(loadAppConfig({ TERMGYM_COUNTDOWN_SECONDS: '-2' }).countdownSeconds).toBe(3);
    expect(warn).toHaveBeenCalledWith('[Config] Ignoring TERMGYM_COUNTDOWN_SECONDS=soon, using 3');
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
