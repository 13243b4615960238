import { Router } from "express";
import { asyncHandler } from "./middleware/errorHandler.js";
import { NotFoundError } from "./errors.js";
import { UpdateExerciseRequestSchema, UpdateStreakRequestSchema, parseRequest } from "./validation.js";
import type { WorkoutStore } from "./storage.js";

export function createProgressRouter(store: WorkoutStore): Router {
  const progress = Router();

  /** Toggle one exercise, then recount that day's progress */
  progress.post(
    "/update-exercise",
    asyncHandler(async (req, res) => {
      const body = parseRequest(UpdateExerciseRequestSchema, req.body);

      const updated = store.updateExerciseCompletion(body.user_id, body.day, body.exercise_index, body.completed);
      if (!updated) throw new NotFoundError("Exercise not found");

      store.syncDayProgress(body.user_id, body.day);
      res.json({ success: true, message: "Exercise status updated", completed: body.completed });
    })
  );

  progress.post(
    "/update-streak",
    asyncHandler(async (req, res) => {
      const body = parseRequest(UpdateStreakRequestSchema, { ...req.query, ...req.body });
      if (!store.updateStreak(body.user_id, body.streak)) {
        throw new NotFoundError("No progress data found");
      }
      res.json({ success: true, message: "Streak updated", streak: body.streak });
    })
  );

  progress.get(
    "/:userId",
    asyncHandler(async (req, res) => {
      const userId = req.params.userId;
      const current = store.getProgress(userId);
      if (!current) throw new NotFoundError("No progress data found");

      res.json({
        success: true,
        progress: current,
        overall_completion: store.calculateCompletionPercentage(userId),
        current_streak: current.current_streak,
      });
    })
  );

  return progress;
}
