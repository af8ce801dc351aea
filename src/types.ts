import type { AttemptRecord, QuizRecord } from "./services/store.js";

// Shared Hono env type for authenticated routes
export type AuthEnv = {
  Variables: {
    userId: string;
    username: string;
    /** The access token the request was authenticated with. */
    accessToken: string;
  };
};

export type QuizEnv = {
  Variables: AuthEnv["Variables"] & { quiz: QuizRecord };
};

export type AttemptEnv = {
  Variables: AuthEnv["Variables"] & { attempt: AttemptRecord };
};
