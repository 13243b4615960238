import { Router } from "express";
import { randomUUID } from "node:crypto";
import { asyncHandler } from "./middleware/errorHandler.js";
import { NotFoundError } from "./errors.js";
import { UserProfileSchema, parseRequest } from "./validation.js";
import type { WorkoutStore } from "./storage.js";

export function createProfileRouter(store: WorkoutStore): Router {
  const profile = Router();

  /** Create or replace a profile */
  profile.post(
    "/create",
    asyncHandler(async (req, res) => {
      const body = parseRequest(UserProfileSchema, req.body);
      const userId = body.user_id || randomUUID();
      store.saveProfile({ ...body, user_id: userId });
      res.json({ success: true, message: "User profile created successfully", user_id: userId });
    })
  );

  profile.get(
    "/:userId",
    asyncHandler(async (req, res) => {
      const found = store.getProfile(req.params.userId);
      if (!found) throw new NotFoundError("User not found");
      res.json({ success: true, profile: found });
    })
  );

  return profile;
}
