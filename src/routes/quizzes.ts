import { Hono } from "hono";
import { requireAuth } from "../middleware/auth.js";
import { requireQuizOwner } from "../middleware/ownership.js";
import {
  CreateQuizRequestSchema,
  PatchQuizRequestSchema,
  UpdateQuizRequestSchema,
} from "../schemas.js";
import { createQuizFromVideo } from "../services/quiz-pipeline.js";
import {
  toAttemptResponse,
  toQuizResponse,
  toQuizSummary,
} from "../services/serializers.js";
import { getStore, type QuizRecord } from "../services/store.js";
import type { AuthEnv } from "../types.js";
import { validateBody } from "./http.js";

export const QUIZ_CREATION_FAILED = "Quiz could not be created. Please try again later.";

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Split quizzes into those created today and those from the seven days before (UTC). */
export function groupRecentQuizzes(quizzes: QuizRecord[], now: Date) {
  const today = startOfUtcDay(now);
  const weekAgo = new Date(today.getTime() - 7 * DAY_MS);

  const createdAt = (quiz: QuizRecord) => new Date(quiz.created_at).getTime();

  return {
    today: quizzes.filter((quiz) => createdAt(quiz) >= today.getTime()),
    last_7_days: quizzes.filter(
      (quiz) => createdAt(quiz) >= weekAgo.getTime() && createdAt(quiz) < today.getTime()
    ),
  };
}

// Mounted under /api; every route composes its own guards
export const quizRoutes = new Hono<AuthEnv>();

// Create a quiz from a YouTube URL (download → transcribe → generate → store)
quizRoutes.post("/createQuiz", requireAuth, async (c) => {
  const body = await validateBody(c, CreateQuizRequestSchema);
  if (!body.ok) return body.response;

  try {
    const quiz = await createQuizFromVideo(c.get("userId"), body.data.url);
    return c.json(toQuizResponse(quiz), 201);
  } catch (err: unknown) {
    console.error(`Quiz creation failed for ${body.data.url}:`, err);
    return c.json({ detail: QUIZ_CREATION_FAILED }, 500);
  }
});

quizRoutes.get("/quizzes", requireAuth, async (c) => {
  const quizzes = await getStore().listQuizzes(c.get("userId"));
  return c.json(quizzes.map(toQuizResponse));
});

// Sidebar listing: today and the previous seven days
quizRoutes.get("/quizzes/recent", requireAuth, async (c) => {
  const now = new Date();
  const since = new Date(startOfUtcDay(now).getTime() - 7 * DAY_MS);
  const quizzes = await getStore().listQuizzes(c.get("userId"), { createdSince: since });
  const groups = groupRecentQuizzes(quizzes, now);

  return c.json({
    today: groups.today.map(toQuizSummary),
    last_7_days: groups.last_7_days.map(toQuizSummary),
  });
});

quizRoutes.get("/quizzes/:id", requireAuth, requireQuizOwner(), (c) => {
  return c.json(toQuizResponse(c.get("quiz")));
});

quizRoutes.put("/quizzes/:id", requireAuth, requireQuizOwner(), async (c) => {
  const body = await validateBody(c, UpdateQuizRequestSchema);
  if (!body.ok) return body.response;

  const updated = await getStore().updateQuiz(c.get("quiz").id, body.data);
  return c.json(toQuizResponse(updated));
});

quizRoutes.patch("/quizzes/:id", requireAuth, requireQuizOwner(), async (c) => {
  const body = await validateBody(c, PatchQuizRequestSchema);
  if (!body.ok) return body.response;

  const updated = await getStore().updateQuiz(c.get("quiz").id, body.data);
  return c.json(toQuizResponse(updated));
});

quizRoutes.delete("/quizzes/:id", requireAuth, requireQuizOwner(), async (c) => {
  await getStore().deleteQuiz(c.get("quiz").id);
  return c.body(null, 204);
});

// Start an attempt; someone else's quiz looks like a missing one here
quizRoutes.post("/quizzes/:id/start", requireAuth, requireQuizOwner(404), async (c) => {
  const attempt = await getStore().createAttempt(c.get("quiz").id, c.get("userId"));
  return c.json(toAttemptResponse(attempt), 201);
});
