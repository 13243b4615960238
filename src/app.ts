import express from "express";
import type { Express } from "express";
import cors from "cors";
import { randomUUID } from "node:crypto";

import { errorHandler } from "./middleware/errorHandler.js";
import { createProfileRouter } from "./profile.js";
import { createWorkoutRouter } from "./workoutGeneration.js";
import { createProgressRouter } from "./progress.js";
import { createStatsRouter } from "./stats.js";
import { pickQuote } from "./quotes.js";
import type { WorkoutStore } from "./storage.js";
import type { WorkoutGenerator } from "./workoutGenerator.js";

export type AppDeps = {
  store: WorkoutStore;
  generator: WorkoutGenerator | null;
  corsOrigin?: string[];
};

export function createApp({ store, generator, corsOrigin = ["*"] }: AppDeps): Express {
  const app = express();

  app.use(express.json({ limit: "2mb" }));
  app.use(cors({ origin: corsOrigin.includes("*") ? true : corsOrigin, credentials: true }));

  app.get("/health", (_req, res) =>
    res.json({
      status: "healthy",
      storage: "operational",
      model: generator ? "operational" : "not initialized",
    })
  );

  app.get("/api/debug/model", (_req, res) =>
    res.json(generator ? { status: "initialized", model: generator.model } : { status: "not initialized", model: null })
  );

  app.get("/api/quotes", (_req, res) => res.json({ success: true, quote: pickQuote() }));
  app.post("/api/user/generate-id", (_req, res) => res.json({ success: true, user_id: randomUUID() }));

  app.use("/api/profile", createProfileRouter(store));
  app.use("/api/workout", createWorkoutRouter({ store, generator }));
  app.use("/api/progress", createProgressRouter(store));
  app.use("/api/stats", createStatsRouter(store));

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: "Not found" });
  });

  app.use(errorHandler);

  return app;
}
