import { ValidationError } from "./errors.js";
import type { UserProfile, WorkoutPlan } from "./types.js";

const NONE_PROVIDED = "None provided";

const RESPONSE_SCHEMA = `{
  "week": number,
  "days": [
    {
      "day": string,
      "focus": string,
      "exercises": [
        {
          "name": string,
          "sets": number,
          "reps": string,
          "rest_seconds": number,
          "notes": string,
          "completed": false
        }
      ]
    }
  ],
  "total_days_in_week": number
}`;

/**
 * Builds the single prompt sent to the model for one week of training.
 * Throws ValidationError when the profile has no usable day count, so the
 * model is never called for it.
 */
export function buildWorkoutPrompt(
  profile: UserProfile,
  previousWorkout?: WorkoutPlan | null,
  feedback?: string | null
): string {
  const days = profile.available_days_per_week;
  if (!days) {
    throw new ValidationError("available_days_per_week is required");
  }

  const feedbackText = feedback?.trim() ? feedback.trim() : NONE_PROVIDED;

  return `You are an expert fitness coach AI.

You MUST return ONLY valid JSON.
NO explanations.
NO markdown.
NO text outside JSON.

The JSON MUST strictly follow this schema:

${RESPONSE_SCHEMA}

User profile:
${JSON.stringify(profile, null, 2)}

Previous workout:
${previousWorkout ? JSON.stringify(previousWorkout, null, 2) : NONE_PROVIDED}

User feedback:
${feedbackText}

CRITICAL RULES:
1. You MUST generate EXACTLY ${days} workout days.
2. Do NOT generate more or fewer days under any circumstance.
3. Each day MUST be labeled sequentially from "Day 1" to "Day ${days}".
4. "total_days_in_week" MUST be ${days}.

Guidelines:
- Use realistic exercises
- Match the user's fitness level and goal
- Only use the listed equipment (bodyweight if the list is empty)
- Make workouts varied and progressive compared to the previous workout
`;
}
