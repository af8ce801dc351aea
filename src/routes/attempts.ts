import { Hono } from "hono";
import { requireAuth } from "../middleware/auth.js";
import { requireAttemptOwner } from "../middleware/ownership.js";
import { SaveAnswerRequestSchema } from "../schemas.js";
import {
  buildQuestionResults,
  completeAttempt,
  formatPercentage,
  isCompleted,
} from "../services/attempt-scorer.js";
import { getStore } from "../services/store.js";
import type { AuthEnv } from "../types.js";
import { validateBody } from "./http.js";

export const attemptRoutes = new Hono<AuthEnv>();

attemptRoutes.use("*", requireAuth);

// Auto-save a single answer while the quiz is being played
attemptRoutes.patch("/:id/answer", requireAttemptOwner, async (c) => {
  const body = await validateBody(c, SaveAnswerRequestSchema, {
    message: "question_id and answer required.",
  });
  if (!body.ok) return body.response;

  await getStore().saveAttemptAnswer(
    c.get("attempt").id,
    body.data.question_id,
    body.data.answer
  );

  return c.json({ detail: "Answer saved successfully." });
});

// Score the attempt and mark it completed (once)
attemptRoutes.post("/:id/complete", requireAttemptOwner, async (c) => {
  const attempt = c.get("attempt");
  const quiz = await getStore().getQuiz(attempt.quiz_id);
  if (!quiz) {
    return c.json({ detail: "Quiz not found." }, 404);
  }

  const outcome = await completeAttempt(attempt, quiz.questions);
  if (outcome.status === "already_completed") {
    return c.json({ detail: "Quiz already completed." }, 400);
  }

  const { result } = outcome;
  return c.json({
    score: result.score,
    correct_answers: result.correctAnswers,
    total_questions: result.totalQuestions,
    percentage: formatPercentage(result.score),
  });
});

attemptRoutes.get("/:id/results", requireAttemptOwner, async (c) => {
  const attempt = c.get("attempt");
  if (!isCompleted(attempt)) {
    return c.json({ detail: "Quiz not completed yet." }, 400);
  }

  const quiz = await getStore().getQuiz(attempt.quiz_id);
  if (!quiz) {
    return c.json({ detail: "Quiz not found." }, 404);
  }

  return c.json({
    quiz_title: quiz.title,
    score: attempt.score,
    completed_at: attempt.completed_at,
    results: buildQuestionResults(quiz.questions, attempt.answers),
  });
});
