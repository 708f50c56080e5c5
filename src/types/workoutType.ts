export const WORKOUT_TYPES = [
  'core_training',
  'cycling',
  'hiit',
  'hiking',
  'other',
  'running',
  'strength_training',
  'swimming',
  'walking',
  'yoga',
] as const;

export type WorkoutType = (typeof WORKOUT_TYPES)[number];

const WORKOUT_TYPE_SET = new Set<string>(WORKOUT_TYPES);

export function isWorkoutType(value: string): value is WorkoutType {
  return WORKOUT_TYPE_SET.has(value);
}
