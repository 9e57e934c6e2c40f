import { parseArgs } from 'node:util';
import { parseExerciseKind } from '../core/exercises';
import { EXERCISE_KINDS, type ExerciseKind } from '../core/models/types';

export type CliOptions = {
  lang: string;
  help: boolean;
  exercise: ExerciseKind | null;
};

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export function parseCliArgs(argv: string[], defaultLang: string): ParseResult {
  let values: { lang?: string; help?: boolean; exercise?: string };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        lang: { type: 'string', short: 'l' },
        help: { type: 'boolean', short: 'h' },
        exercise: { type: 'string', short: 'e' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  let exercise: ExerciseKind | null = null;
  if (values.exercise !== undefined) {
    exercise = parseExerciseKind(values.exercise);
    if (!exercise) {
      return { ok: false, error: `Unknown exercise "${values.exercise}" (expected ${EXERCISE_KINDS.join(' or ')})` };
    }
  }

  return {
    ok: true,
    options: {
      lang: values.lang || defaultLang,
      help: values.help ?? false,
      exercise,
    },
  };
}
