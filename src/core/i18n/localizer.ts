import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { format } from 'node:util';
import { DEFAULT_LANGUAGE } from '../config/appConfig';

/**
 * Key → display string lookup. Misses return the key itself, so a
 * missing translation shows up as its key name instead of failing.
 */
export interface TextProvider {
  lookup(key: string): string;
  lookupFormatted(key: string, ...args: unknown[]): string;
}

export type Translations = Readonly<Record<string, string>>;

export function parseTranslations(raw: string, source: string): Translations {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Failed to parse translation file ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Translation file ${source} must contain a JSON object`);
  }

  const translations: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new Error(`Translation file ${source}: value for "${key}" is not a string`);
    }
    translations[key] = value;
  }
  return Object.freeze(translations);
}

export class Localizer implements TextProvider {
  constructor(
    private readonly language: string,
    private readonly translations: Translations = {}
  ) {}

  /**
   * Load locales/<lang>.json. A missing file falls back to English with a
   * warning; an unreadable or malformed file throws.
   */
  static load(language: string, localesDir: string): Localizer {
    let resolved = language;
    let filename = path.join(localesDir, `${language}.json`);

    if (!existsSync(filename)) {
      console.warn(`[Localizer] No translations for "${language}", falling back to ${DEFAULT_LANGUAGE}`);
      resolved = DEFAULT_LANGUAGE;
      filename = path.join(localesDir, `${DEFAULT_LANGUAGE}.json`);
    }

    let raw: string;
    try {
      raw = readFileSync(filename, 'utf8');
    } catch (err) {
      throw new Error(`Failed to read translation file ${filename}: ${err instanceof Error ? err.message : String(err)}`);
    }

    return new Localizer(resolved, parseTranslations(raw, filename));
  }

  /**
   * Never throws: falls back to English, then to an empty table.
   */
  static loadOrFallback(language: string, localesDir: string): Localizer {
    try {
      return Localizer.load(language, localesDir);
    } catch (err) {
      console.warn('[Localizer] Error initializing localizer:', err instanceof Error ? err.message : err);
    }

    if (language !== DEFAULT_LANGUAGE) {
      console.warn(`[Localizer] Falling back to ${DEFAULT_LANGUAGE}...`);
      try {
        return Localizer.load(DEFAULT_LANGUAGE, localesDir);
      } catch (err) {
        console.warn('[Localizer] English translations unavailable:', err instanceof Error ? err.message : err);
      }
    }

    return new Localizer(DEFAULT_LANGUAGE);
  }

  lookup(key: string): string {
    return Object.hasOwn(this.translations, key) ? this.translations[key] : key;
  }

  lookupFormatted(key: string, ...args: unknown[]): string {
    return format(this.lookup(key), ...args);
  }

  getLanguage(): string {
    return this.language;
  }
}
