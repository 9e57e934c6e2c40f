import 'dotenv/config';
import { parseCliArgs } from './app/args';
import { countdown, selectExercise, stdinReader } from './app/prompts';
import { AnimationLoop } from './core/animation/loop';
import { createAnimationConfig } from './core/config/animation';
import { loadAppConfig } from './core/config/appConfig';
import { createExercise } from './core/exercises';
import { Localizer } from './core/i18n/localizer';
import { ANSI, TerminalRenderer } from './core/render/terminal';

async function main(): Promise<number> {
  const appConfig = loadAppConfig();
  const parsed = parseCliArgs(process.argv.slice(2), appConfig.language);

  if (!parsed.ok) {
    const text = Localizer.loadOrFallback(appConfig.language, appConfig.localesDir);
    console.error(parsed.error);
    console.error(text.lookup('language_help'));
    return 2;
  }

  const { options } = parsed;
  const text = Localizer.loadOrFallback(options.lang, appConfig.localesDir);

  if (options.help) {
    console.log(text.lookup('language_help'));
    return 0;
  }

  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  const renderer = new TerminalRenderer();
  renderer.hideCursor();

  try {
    const kind = options.exercise
      ?? await selectExercise(text, renderer, stdinReader(interrupt), controller.signal);
    if (!kind) return 0;

    if (!await countdown(text, renderer, appConfig.countdownSeconds, controller.signal)) {
      return 0;
    }

    const animation = createAnimationConfig();
    const exercise = createExercise(kind, text, animation);
    const loop = new AnimationLoop(exercise, text, renderer, { fps: animation.fps });
    await loop.run(controller.signal);
    return 0;
  } finally {
    renderer.showCursor();
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stdout.write(ANSI.showCursor);
    console.error('[terminal-gym] Fatal error:', err);
    process.exitCode = 1;
  }
);
