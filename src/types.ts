import type { z } from "zod";
import type {
  DayWorkoutSchema,
  ExerciseSchema,
  GenerateWorkoutRequestSchema,
  RegenerateWorkoutRequestSchema,
  StoredProfileSchema,
  UpdateExerciseRequestSchema,
  UpdateStreakRequestSchema,
  UserProfileSchema,
  UserProgressDaySchema,
  UserProgressSchema,
  WorkoutPlanSchema,
} from "./validation.js";

export type Exercise = z.infer<typeof ExerciseSchema>;
export type DayWorkout = z.infer<typeof DayWorkoutSchema>;
export type WorkoutPlan = z.infer<typeof WorkoutPlanSchema>;

/** Profile as submitted; `user_id` may still be missing. */
export type UserProfile = z.infer<typeof UserProfileSchema>;
export type StoredProfile = z.infer<typeof StoredProfileSchema>;

export type UserProgressDay = z.infer<typeof UserProgressDaySchema>;
export type UserProgress = z.infer<typeof UserProgressSchema>;

export type GenerateWorkoutRequest = z.infer<typeof GenerateWorkoutRequestSchema>;
export type RegenerateWorkoutRequest = z.infer<typeof RegenerateWorkoutRequestSchema>;
export type UpdateExerciseRequest = z.infer<typeof UpdateExerciseRequestSchema>;
export type UpdateStreakRequest = z.infer<typeof UpdateStreakRequestSchema>;
