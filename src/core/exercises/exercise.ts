import type { ExerciseKind } from '../models/types';

/**
 * One guided exercise. Exactly one is active per run; the animation loop
 * calls update() then render() once per tick.
 */
export interface Exercise {
  readonly kind: ExerciseKind;
  readonly name: string;
  readonly description: string;

  update(): void;
  render(): string[];
  getInstructions(): string;
  getTips(): string[];
  getCounter(): string;
  isComplete(): boolean;
  reset(): void;
}

export function completionKey(kind: ExerciseKind): 'workout_complete' | 'meditation_complete' {
  switch (kind) {
    case 'strength':
      return 'workout_complete';
    case 'meditation':
      return 'meditation_complete';
  }
}
