// Workout generation pipeline: prompt -> model -> strict JSON -> validated plan.
// Persisting the result is up to the caller.

import type { ModelClient } from "./modelClient.js";
import { buildWorkoutPrompt } from "./prompts.js";
import {
  GenerationError,
  InvalidProfileError,
  MalformedResponseError,
  ModelUnavailableError,
  SchemaViolationError,
} from "./errors.js";
import { validate, WorkoutPlanSchema } from "./validation.js";
import type { UserProfile, WorkoutPlan } from "./types.js";

export type GenerateWorkoutInput = {
  profile: UserProfile;
  userId: string;
  previousWorkout?: WorkoutPlan | null;
  feedback?: string | null;
};

export type GenerationResult =
  | { success: true; data: WorkoutPlan }
  | { success: false; error: GenerationError };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class WorkoutGenerator {
  private readonly client: ModelClient;
  private readonly now: () => Date;

  constructor(client: ModelClient, options?: { now?: () => Date }) {
    this.client = client;
    this.now = options?.now ?? (() => new Date());
  }

  get model(): string {
    return this.client.model;
  }

  async generate(input: GenerateWorkoutInput): Promise<GenerationResult> {
    const { profile, userId, previousWorkout, feedback } = input;

    let prompt: string;
    try {
      prompt = buildWorkoutPrompt(profile, previousWorkout, feedback);
    } catch (err) {
      return fail(new InvalidProfileError(`Cannot build prompt: ${errorMessage(err)}`, err));
    }

    let raw: string;
    try {
      raw = await this.client.complete(prompt);
    } catch (err) {
      console.error(`generator: model call failed for ${userId}:`, errorMessage(err));
      return fail(new ModelUnavailableError(`Model request failed: ${errorMessage(err)}`, err));
    }

    // no fence stripping or other cleanup: the model must answer with bare JSON
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.warn(`generator: non-JSON answer for ${userId} (${raw.length} chars)`);
      return fail(new MalformedResponseError(`Invalid JSON from model: ${errorMessage(err)}`, err));
    }
    if (!isJsonObject(parsed)) {
      return fail(new MalformedResponseError("Invalid JSON from model: expected an object at the top level"));
    }

    const candidate = {
      ...parsed,
      user_id: userId,
      generated_at: this.now().toISOString(),
    };

    const result = validate(WorkoutPlanSchema, candidate);
    if (!result.success) {
      console.warn(`generator: schema violation for ${userId}: ${result.error}`);
      return fail(new SchemaViolationError(`Workout does not match schema: ${result.error}`, result.issues));
    }

    const plan = result.data;
    const expectedDays = profile.available_days_per_week;
    if (plan.total_days_in_week !== expectedDays) {
      const issue = `total_days_in_week: expected ${expectedDays}, got ${plan.total_days_in_week}`;
      console.warn(`generator: schema violation for ${userId}: ${issue}`);
      return fail(new SchemaViolationError(`Workout does not match schema: ${issue}`, [issue]));
    }

    console.log(`generator: week ${plan.week} with ${plan.days.length} days for ${userId}`);
    return { success: true, data: plan };
  }
}

function fail(error: GenerationError): GenerationResult {
  return { success: false, error };
}
