import { createMiddleware } from "hono/factory";
import { z } from "zod";
import { getStore } from "../services/store.js";
import type { AttemptEnv, QuizEnv } from "../types.js";

// Guards: requireAuth must run first (userId on context). Each loads the
// entity named by the :id param, checks ownership and puts it on context.

const IdSchema = z.string().uuid();

/**
 * `foreignStatus` decides whether someone else's quiz is reported as 403 or
 * hidden behind a 404.
 */
export function requireQuizOwner(foreignStatus: 403 | 404 = 403) {
  return createMiddleware<QuizEnv>(async (c, next) => {
    const id = c.req.param("id");
    const quiz = id && IdSchema.safeParse(id).success ? await getStore().getQuiz(id) : null;

    if (!quiz || (quiz.user_id !== c.get("userId") && foreignStatus === 404)) {
      return c.json({ detail: "Quiz not found." }, 404);
    }
    if (quiz.user_id !== c.get("userId")) {
      return c.json({ detail: "Access denied - Quiz does not belong to user." }, 403);
    }

    c.set("quiz", quiz);
    await next();
  });
}

export const requireAttemptOwner = createMiddleware<AttemptEnv>(async (c, next) => {
  const id = c.req.param("id");
  const attempt =
    id && IdSchema.safeParse(id).success ? await getStore().getAttempt(id) : null;

  // Other users' attempts are indistinguishable from missing ones
  if (!attempt || attempt.user_id !== c.get("userId")) {
    return c.json({ detail: "Quiz attempt not found." }, 404);
  }

  c.set("attempt", attempt);
  await next();
});
