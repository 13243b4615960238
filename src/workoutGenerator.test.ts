import { WorkoutGenerator } from "./workoutGenerator.js";
import type { ModelClient } from "./modelClient.js";
import {
  InvalidProfileError,
  MalformedResponseError,
  ModelUnavailableError,
  SchemaViolationError,
} from "./errors.js";
import type { UserProfile } from "./types.js";

class FakeModelClient implements ModelClient {
  readonly model = "fake-model";
  prompts: string[] = [];
  reply: string | Error;

  constructor(reply: string | Error) {
    this.reply = reply;
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    user_id: "user-1",
    age: 31,
    fitness_goal: "strength",
    experience_level: "intermediate",
    available_days_per_week: 3,
    equipment: ["barbell", "dumbbells"],
    ...overrides,
  };
}

const SQUAT = { name: "Back squat", sets: 4, reps: "6-8", rest_seconds: 120, notes: "", completed: false };

function modelPlan(dayCount: number, overrides: Record<string, unknown> = {}, firstDayExercises: unknown[] = [SQUAT]) {
  return {
    week: 2,
    days: Array.from({ length: dayCount }, (_, i) => ({
      day: `Day ${i + 1}`,
      focus: "Full body",
      exercises: i === 0 ? firstDayExercises : [SQUAT],
    })),
    total_days_in_week: dayCount,
    ...overrides,
  };
}

const FIXED_NOW = new Date("2026-01-05T10:00:00.000Z");

describe("WorkoutGenerator", () => {
  const logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
  const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
  const errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});

  afterAll(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it("returns a validated plan with server-assigned user_id and generated_at", async () => {
    const client = new FakeModelClient(
      JSON.stringify(modelPlan(3, { user_id: "someone-else", generated_at: "1999-01-01T00:00:00.000Z" }))
    );
    const generator = new WorkoutGenerator(client, { now: () => FIXED_NOW });

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.user_id).toBe("user-1");
    expect(result.data.generated_at).toBe("2026-01-05T10:00:00.000Z");
    expect(result.data.week).toBe(2);
    expect(result.data.days).toHaveLength(3);
    expect(result.data.total_days_in_week).toBe(3);
    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0]).toContain("You MUST generate EXACTLY 3 workout days.");
  });

  it("stamps generated_at from the real clock by default", async () => {
    const startedAt = Date.now();
    const generator = new WorkoutGenerator(new FakeModelClient(JSON.stringify(modelPlan(2))));

    const result = await generator.generate({
      profile: makeProfile({ available_days_per_week: 2 }),
      userId: "user-1",
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(Date.parse(result.data.generated_at)).toBeGreaterThanOrEqual(startedAt);
  });

  it("fills defaults for notes and completed", async () => {
    const plan = modelPlan(1, {}, [{ name: "Plank", sets: 3, reps: "30s", rest_seconds: 60 }]);
    const generator = new WorkoutGenerator(new FakeModelClient(JSON.stringify(plan)), { now: () => FIXED_NOW });

    const result = await generator.generate({
      profile: makeProfile({ available_days_per_week: 1 }),
      userId: "user-1",
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.days[0].exercises[0]).toEqual({
      name: "Plank",
      sets: 3,
      reps: "30s",
      rest_seconds: 60,
      notes: "",
      completed: false,
    });
  });

  it("rejects output that is not JSON", async () => {
    const generator = new WorkoutGenerator(new FakeModelClient("not json"));

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MalformedResponseError);
    expect(result.error.kind).toBe("malformed_response");
    expect(result.error.message.startsWith("Invalid JSON from model:")).toBe(true);
  });

  it("does not strip markdown fences", async () => {
    const fenced = "```json\n" + JSON.stringify(modelPlan(3)) + "\n```";
    const generator = new WorkoutGenerator(new FakeModelClient(fenced));

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("malformed_response");
  });

  it("rejects a JSON value that is not an object", async () => {
    const generator = new WorkoutGenerator(new FakeModelClient("[1, 2, 3]"));

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MalformedResponseError);
    expect(result.error.message).toBe("Invalid JSON from model: expected an object at the top level");
  });

  it("rejects a plan whose days do not match total_days_in_week", async () => {
    const generator = new WorkoutGenerator(
      new FakeModelClient(JSON.stringify(modelPlan(4, { total_days_in_week: 5 })))
    );

    const result = await generator.generate({
      profile: makeProfile({ available_days_per_week: 5 }),
      userId: "user-1",
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(SchemaViolationError);
    expect(result.error.kind).toBe("schema_violation");
    if (!(result.error instanceof SchemaViolationError)) return;
    expect(result.error.issues).toEqual(["days: expected 5 days, got 4"]);
  });

  it("rejects a consistent plan with a different day count than the profile asks for", async () => {
    const generator = new WorkoutGenerator(new FakeModelClient(JSON.stringify(modelPlan(4))));

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    expect(result.success).toBe(false);
    if (result.success || !(result.error instanceof SchemaViolationError)) {
      throw new Error("expected a schema violation");
    }
    expect(result.error.issues).toEqual(["total_days_in_week: expected 3, got 4"]);
  });

  it("reports missing fields with their path", async () => {
    const plan = modelPlan(3, {}, [{ name: "Row", reps: "10", rest_seconds: 60 }]);
    const generator = new WorkoutGenerator(new FakeModelClient(JSON.stringify(plan)));

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    if (result.success || !(result.error instanceof SchemaViolationError)) {
      throw new Error("expected a schema violation");
    }
    expect(result.error.issues).toEqual(["days.0.exercises.0.sets: Required"]);
  });

  it("wraps model failures without retrying", async () => {
    const client = new FakeModelClient(new Error("quota exceeded"));
    const generator = new WorkoutGenerator(client);

    const result = await generator.generate({ profile: makeProfile(), userId: "user-1" });

    expect(client.prompts).toHaveLength(1);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ModelUnavailableError);
    expect(result.error.message).toBe("Model request failed: quota exceeded");
  });

  it("does not call the model when the profile has no day count", async () => {
    const client = new FakeModelClient(JSON.stringify(modelPlan(3)));
    const generator = new WorkoutGenerator(client);

    const result = await generator.generate({
      profile: makeProfile({ available_days_per_week: 0 }),
      userId: "user-1",
    });

    expect(client.prompts).toHaveLength(0);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(InvalidProfileError);
    expect(result.error.kind).toBe("validation");
    expect(result.error.message).toBe("Cannot build prompt: available_days_per_week is required");
  });
});
