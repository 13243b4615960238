// src/workoutGeneration.ts
import { Router } from "express";
import { randomUUID } from "node:crypto";
import { asyncHandler, AppError } from "./middleware/errorHandler.js";
import { NotFoundError, SchemaViolationError } from "./errors.js";
import type { GenerationError, GenerationErrorKind } from "./errors.js";
import { GenerateWorkoutRequestSchema, RegenerateWorkoutRequestSchema, parseRequest } from "./validation.js";
import type { WorkoutStore } from "./storage.js";
import type { WorkoutGenerator } from "./workoutGenerator.js";

export type WorkoutRouterDeps = {
  store: WorkoutStore;
  /** null when the model is not configured */
  generator: WorkoutGenerator | null;
};

export function generationStatus(kind: GenerationErrorKind): number {
  switch (kind) {
    case "validation":
      return 400;
    case "model_unavailable":
    case "malformed_response":
    case "schema_violation":
      return 500;
  }
}

function toHttpError(error: GenerationError, prefix: string): AppError {
  return new AppError(`${prefix}: ${error.message}`, generationStatus(error.kind), {
    code: error.kind,
    details: error instanceof SchemaViolationError ? error.issues : undefined,
  });
}

function requireGenerator(generator: WorkoutGenerator | null): WorkoutGenerator {
  if (!generator) {
    throw new AppError("Workout generator not initialized. Check OPENAI_API_KEY.", 503, {
      code: "generator_unavailable",
    });
  }
  return generator;
}

export function createWorkoutRouter({ store, generator }: WorkoutRouterDeps): Router {
  const workout = Router();

  workout.post(
    "/generate",
    asyncHandler(async (req, res) => {
      const body = parseRequest(GenerateWorkoutRequestSchema, req.body);
      const gen = requireGenerator(generator);

      const userId = body.user_profile.user_id || randomUUID();
      const profile = { ...body.user_profile, user_id: userId };
      store.saveProfile(profile);

      const result = await gen.generate({
        profile,
        userId,
        previousWorkout: body.previous_workout,
        feedback: body.feedback,
      });
      if (!result.success) throw toHttpError(result.error, "Workout generation error");

      const plan = result.data;
      store.saveWorkout(plan);
      if (!store.getProgress(userId)) {
        store.initializeProgress(userId, plan.total_days_in_week);
      }

      res.json({ success: true, workout: plan, message: "Workout generated successfully" });
    })
  );

  workout.post(
    "/regenerate",
    asyncHandler(async (req, res) => {
      const body = parseRequest(RegenerateWorkoutRequestSchema, req.body);
      const gen = requireGenerator(generator);

      const profile = store.getProfile(body.user_id);
      if (!profile) throw new NotFoundError("User not found");

      const result = await gen.generate({
        profile,
        userId: body.user_id,
        previousWorkout: body.current_workout ?? store.getCurrentWorkout(body.user_id),
        feedback: body.feedback_type,
      });
      if (!result.success) throw toHttpError(result.error, "Regeneration error");

      store.saveWorkout(result.data);
      res.json({
        success: true,
        workout: result.data,
        message: `Workout regenerated with '${body.feedback_type}' adjustments`,
      });
    })
  );

  workout.get(
    "/history/:userId",
    asyncHandler(async (req, res) => {
      const workouts = store.getAllWorkouts(req.params.userId);
      res.json({ success: true, workouts, count: workouts.length });
    })
  );

  workout.get(
    "/:userId",
    asyncHandler(async (req, res) => {
      const current = store.getCurrentWorkout(req.params.userId);
      if (!current) throw new NotFoundError("No workout found for this user");
      res.json({ success: true, workout: current });
    })
  );

  return workout;
}
