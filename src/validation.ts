// Validation built on zod
import { z } from "zod";
import { ValidationError } from "./errors.js";

export const ExerciseSchema = z.object({
  name: z.string().min(1),
  sets: z.number().int(),
  reps: z.string(),
  rest_seconds: z.number().int(),
  notes: z
    .string()
    .nullish()
    .transform((v) => v ?? ""),
  completed: z.boolean().default(false),
});

export const DayWorkoutSchema = z.object({
  day: z.string().min(1),
  focus: z.string(),
  exercises: z.array(ExerciseSchema),
});

export const WorkoutPlanSchema = z
  .object({
    user_id: z.string().min(1),
    week: z.number().int(),
    days: z.array(DayWorkoutSchema),
    total_days_in_week: z.number().int().positive(),
    generated_at: z.string().datetime(),
  })
  .superRefine((plan, ctx) => {
    if (plan.days.length !== plan.total_days_in_week) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["days"],
        message: `expected ${plan.total_days_in_week} days, got ${plan.days.length}`,
      });
    }
  });

export const UserProfileSchema = z.object({
  user_id: z.string().min(1).nullish(),
  age: z.number().int().positive().nullish(),
  gender: z.string().nullish(),
  height_cm: z.number().int().positive().nullish(),
  weight_kg: z.number().positive().nullish(),
  fitness_goal: z.string().nullish(),
  experience_level: z.string().nullish(),
  available_days_per_week: z.number().int().positive(),
  equipment: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []),
});

export const StoredProfileSchema = UserProfileSchema.extend({
  user_id: z.string().min(1),
});

export const UserProgressDaySchema = z.object({
  day: z.string(),
  total_exercises: z.number().int().nonnegative(),
  exercises_completed: z.number().int().nonnegative(),
});

export const UserProgressSchema = z.object({
  user_id: z.string().min(1),
  days: z.array(UserProgressDaySchema),
  current_streak: z.number().int().nonnegative().default(0),
});

export const GenerateWorkoutRequestSchema = z.object({
  user_profile: UserProfileSchema,
  previous_workout: WorkoutPlanSchema.nullish(),
  feedback: z.string().nullish(),
});

export const RegenerateWorkoutRequestSchema = z.object({
  user_id: z.string().min(1),
  current_workout: WorkoutPlanSchema.nullish(),
  feedback_type: z.string().min(1),
});

export const UpdateExerciseRequestSchema = z.object({
  user_id: z.string().min(1),
  day: z.string().min(1),
  exercise_index: z.number().int(),
  completed: z.boolean(),
});

// update-streak historically took its fields from the query string
export const UpdateStreakRequestSchema = z.object({
  user_id: z.string().min(1),
  streak: z.union([
    z.number().int().nonnegative(),
    z.string().trim().min(1).pipe(z.coerce.number().int().nonnegative()),
  ]),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message));
}

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): { success: true; data: z.output<S> } | { success: false; error: string; issues: string[] } {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  const issues = formatIssues(parsed.error);
  return { success: false, error: issues.join("; "), issues };
}

/** Validates a request payload, throwing a 400 on failure. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = validate(schema, data);
  if (!result.success) {
    throw new ValidationError(`Invalid request: ${result.error}`, result.issues);
  }
  return result.data;
}
