import type { AnimationConfig } from '../config/animation';
import type { TextProvider } from '../i18n/localizer';
import type { ExerciseKind } from '../models/types';
import type { Exercise } from './exercise';
import { MeditationExercise } from './meditation';
import { StrengthExercise } from './strength';

export type { Exercise };
export { completionKey } from './exercise';
export { MeditationExercise, StrengthExercise };

export function createExercise(kind: ExerciseKind, text: TextProvider, config: AnimationConfig): Exercise {
  switch (kind) {
    case 'strength':
      return new StrengthExercise(text, config);
    case 'meditation':
      return new MeditationExercise(text, config);
  }
}

export function parseExerciseKind(value: string): ExerciseKind | null {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'strength':
      return 'strength';
    case '2':
    case 'meditation':
      return 'meditation';
    default:
      return null;
  }
}
