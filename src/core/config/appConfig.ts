import { fileURLToPath } from 'node:url';

export interface AppConfig {
  language: string;
  localesDir: string;
  countdownSeconds: number;
}

export const DEFAULT_LANGUAGE = 'en';

export const DEFAULT_LOCALES_DIR = fileURLToPath(new URL('../../../locales', import.meta.url));

const DEFAULT_APP_CONFIG: AppConfig = {
  language: DEFAULT_LANGUAGE,
  localesDir: DEFAULT_LOCALES_DIR,
  countdownSeconds: 3,
};

/**
 * Read settings from the environment (dotenv is loaded by the entry point).
 * Unparseable values fall back to defaults with a warning.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const countdownRaw = env.TERMGYM_COUNTDOWN_SECONDS;
  let countdownSeconds = DEFAULT_APP_CONFIG.countdownSeconds;

  if (countdownRaw !== undefined && countdownRaw !== '') {
    const parsed = Number.parseInt(countdownRaw, 10);
    if (Number.isInteger(parsed) && parsed >= 0) {
      countdownSeconds = parsed;
    } else {
      console.warn(`[Config] Ignoring TERMGYM_COUNTDOWN_SECONDS=${countdownRaw}, using ${countdownSeconds}`);
    }
  }

  return {
    language: env.TERMGYM_LANG || DEFAULT_APP_CONFIG.language,
    localesDir: env.TERMGYM_LOCALES_DIR || DEFAULT_APP_CONFIG.localesDir,
    countdownSeconds,
  };
}
