import { Router } from "express";
import { asyncHandler } from "./middleware/errorHandler.js";
import { NotFoundError } from "./errors.js";
import type { WorkoutStore } from "./storage.js";

export function createStatsRouter(store: WorkoutStore): Router {
  const stats = Router();

  stats.get(
    "/:userId",
    asyncHandler(async (req, res) => {
      const userId = req.params.userId;
      const profile = store.getProfile(userId);
      if (!profile) throw new NotFoundError("User not found");

      const progress = store.getProgress(userId) ?? null;
      res.json({
        success: true,
        profile,
        progress,
        current_workout: store.getCurrentWorkout(userId) ?? null,
        workouts_count: store.getAllWorkouts(userId).length,
        weekly_completion: store.calculateCompletionPercentage(userId),
        current_streak: progress?.current_streak ?? 0,
      });
    })
  );

  return stats;
}
