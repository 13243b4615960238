// src/storage.ts
// Profiles, workout history and progress held in memory and mirrored to JSON
// files. Every mutation rewrites all three files before returning, or is rolled
// back when the write fails; mutations are fully synchronous, so no other
// request can interleave with one.

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { StoredProfileSchema, UserProgressSchema, WorkoutPlanSchema, formatIssues } from "./validation.js";
import type { StoredProfile, UserProgress, WorkoutPlan } from "./types.js";

type TableName = "users" | "workouts" | "progress";

const TABLE_FILES: Record<TableName, string> = {
  users: "users.json",
  workouts: "workouts.json",
  progress: "progress.json",
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sameDay(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class WorkoutStore {
  readonly dataDir: string;

  private users: Map<string, StoredProfile>;
  private workouts: Map<string, WorkoutPlan[]>;
  private progress: Map<string, UserProgress>;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    fs.mkdirSync(dataDir, { recursive: true });

    this.users = this.loadTable("users", StoredProfileSchema);
    this.workouts = this.loadTable("workouts", z.array(WorkoutPlanSchema));
    this.progress = this.loadTable("progress", UserProgressSchema);

    console.log(
      `storage: ${this.users.size} profiles, ${this.workouts.size} workout histories, ${this.progress.size} progress records from ${dataDir}`
    );
  }

  // ---------------------------------------------------------------------------
  // persistence
  // ---------------------------------------------------------------------------

  private filePath(name: TableName): string {
    return path.join(this.dataDir, TABLE_FILES[name]);
  }

  /** A missing file is an empty table; a broken one is logged and ignored. */
  private loadTable<S extends z.ZodTypeAny>(name: TableName, valueSchema: S): Map<string, z.output<S>> {
    const file = this.filePath(name);
    if (!fs.existsSync(file)) return new Map();

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (err) {
      console.warn(`storage: cannot read ${file}, starting with an empty ${name} table:`, errorMessage(err));
      return new Map();
    }

    const parsed = z.record(valueSchema).safeParse(raw);
    if (!parsed.success) {
      console.warn(
        `storage: ${file} has invalid contents, starting with an empty ${name} table: ${formatIssues(parsed.error).join("; ")}`
      );
      return new Map();
    }
    return new Map(Object.entries(parsed.data));
  }

  /** Writes `<file>.tmp` and returns the rename still to be done. */
  private stageTable(name: TableName, rows: Map<string, unknown>): { tmp: string; file: string } {
    const file = this.filePath(name);
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(Object.fromEntries(rows), null, 2));
    return { tmp, file };
  }

  // all three temp files are written before any of them replaces its table
  private persist(): void {
    const staged = [
      this.stageTable("users", this.users),
      this.stageTable("workouts", this.workouts),
      this.stageTable("progress", this.progress),
    ];
    for (const { tmp, file } of staged) fs.renameSync(tmp, file);
  }

  /** Applies `change` and persists it; a failed write restores the previous state and rethrows. */
  private commit(change: () => void): void {
    const users = structuredClone(this.users);
    const workouts = structuredClone(this.workouts);
    const progress = structuredClone(this.progress);

    change();
    try {
      this.persist();
    } catch (err) {
      this.users = users;
      this.workouts = workouts;
      this.progress = progress;
      console.error("storage: failed to write data files, change rolled back:", err);
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // profiles
  // ---------------------------------------------------------------------------

  /** Upsert; an existing profile is replaced, never merged. */
  saveProfile(profile: StoredProfile): void {
    this.commit(() => {
      this.users.set(profile.user_id, structuredClone(profile));
    });
  }

  getProfile(userId: string): StoredProfile | undefined {
    const profile = this.users.get(userId);
    return profile && structuredClone(profile);
  }

  userExists(userId: string): boolean {
    return this.users.has(userId);
  }

  // ---------------------------------------------------------------------------
  // workouts
  // ---------------------------------------------------------------------------

  saveWorkout(workout: WorkoutPlan): void {
    this.commit(() => {
      const history = this.workouts.get(workout.user_id) ?? [];
      history.push(structuredClone(workout));
      this.workouts.set(workout.user_id, history);
    });
  }

  /** The most recently saved workout. */
  getCurrentWorkout(userId: string): WorkoutPlan | undefined {
    const history = this.workouts.get(userId);
    if (!history || history.length === 0) return undefined;
    return structuredClone(history[history.length - 1]);
  }

  getAllWorkouts(userId: string): WorkoutPlan[] {
    return structuredClone(this.workouts.get(userId) ?? []);
  }

  /**
   * Sets `completed` on one exercise of the current workout. The first day
   * whose label matches case-insensitively is used. Returns false, without
   * writing anything, when there is no workout, no such day or the index is
   * out of range.
   */
  updateExerciseCompletion(userId: string, day: string, exerciseIndex: number, completed: boolean): boolean {
    const history = this.workouts.get(userId) ?? [];
    const workout = history[history.length - 1];
    if (!workout) return false;

    const dayWorkout = workout.days.find((d) => sameDay(d.day, day));
    if (!dayWorkout) return false;

    if (!Number.isInteger(exerciseIndex) || exerciseIndex < 0 || exerciseIndex >= dayWorkout.exercises.length) {
      return false;
    }

    this.commit(() => {
      dayWorkout.exercises[exerciseIndex].completed = completed;
    });
    return true;
  }

  // ---------------------------------------------------------------------------
  // progress
  // ---------------------------------------------------------------------------

  /** Replaces any existing progress with `totalDays` empty days. */
  initializeProgress(userId: string, totalDays: number): UserProgress {
    const progress: UserProgress = {
      user_id: userId,
      days: Array.from({ length: totalDays }, (_, i) => ({
        day: `Day ${i + 1}`,
        total_exercises: 0,
        exercises_completed: 0,
      })),
      current_streak: 0,
    };
    this.commit(() => {
      this.progress.set(userId, progress);
    });
    return structuredClone(progress);
  }

  getProgress(userId: string): UserProgress | undefined {
    const progress = this.progress.get(userId);
    return progress && structuredClone(progress);
  }

  updateProgress(userId: string, progress: UserProgress): void {
    this.commit(() => {
      this.progress.set(userId, structuredClone(progress));
    });
  }

  /**
   * Recounts one progress day from the matching day of the current workout.
   * Returns the updated progress, or undefined when either side is missing.
   */
  syncDayProgress(userId: string, day: string): UserProgress | undefined {
    const progress = this.progress.get(userId);
    const workout = this.getCurrentWorkout(userId);
    if (!progress || !workout) return undefined;

    const dayProgress = progress.days.find((d) => sameDay(d.day, day));
    const dayWorkout = workout.days.find((d) => sameDay(d.day, day));
    if (dayProgress && dayWorkout) {
      this.commit(() => {
        dayProgress.total_exercises = dayWorkout.exercises.length;
        dayProgress.exercises_completed = dayWorkout.exercises.filter((e) => e.completed).length;
      });
    }
    return structuredClone(progress);
  }

  /** Percentage in [0, 100] over all progress days; 0 when nothing is tracked. */
  calculateCompletionPercentage(userId: string): number {
    const progress = this.progress.get(userId);
    if (!progress || progress.days.length === 0) return 0;

    const total = progress.days.reduce((sum, d) => sum + d.total_exercises, 0);
    if (total === 0) return 0;

    const completed = progress.days.reduce((sum, d) => sum + d.exercises_completed, 0);
    return (completed / total) * 100;
  }

  /** No-op returning false when the user has no progress record. */
  updateStreak(userId: string, newStreak: number): boolean {
    const progress = this.progress.get(userId);
    if (!progress) return false;
    this.commit(() => {
      progress.current_streak = newStreak;
    });
    return true;
  }

  clear(): void {
    this.commit(() => {
      this.users.clear();
      this.workouts.clear();
      this.progress.clear();
    });
  }
}
