// src/index.ts
import { readConfig } from "./config.js";
import { createApp } from "./app.js";
import { ConfigurationError } from "./errors.js";
import { createModelClient } from "./modelClient.js";
import { WorkoutStore } from "./storage.js";
import { WorkoutGenerator } from "./workoutGenerator.js";

const config = readConfig();

function createGenerator(): WorkoutGenerator | null {
  try {
    return new WorkoutGenerator(createModelClient(config));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.warn(`generator: disabled (${err.message}); generation endpoints will answer 503`);
      return null;
    }
    throw err;
  }
}

const store = new WorkoutStore(config.dataDir);
const generator = createGenerator();
const app = createApp({ store, generator, corsOrigin: config.corsOrigin });

const server = app.listen(config.port, () => {
  console.log(`api: listening on ${config.port} (${config.nodeEnv})`);
  console.log(generator ? `api: model ${generator.model}` : "api: model not initialized");
});

function shutdown(signal: string) {
  console.log(`api: ${signal} received, shutting down`);
  server.close((err) => {
    if (err) {
      console.error("api: close failed:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
