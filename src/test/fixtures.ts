import { vi } from "vitest";
import { issueToken } from "../services/auth.js";
import type { CandidateQuiz } from "../services/quiz-generator.js";
import type { NewQuiz, UserRecord } from "../services/store.js";
import type { MemoryQuizStore } from "./memory-store.js";

export function stubTestEnv(): void {
  vi.stubEnv("SUPABASE_URL", "http://localhost:54321");
  vi.stubEnv("SUPABASE_SERVICE_KEY", "test-service-key");
  vi.stubEnv("JWT_SECRET", "test-secret");
  vi.stubEnv("ANTHROPIC_API_KEY", "test-anthropic-key");
  vi.stubEnv("OPENAI_API_KEY", "test-openai-key");
  vi.stubEnv("DEBUG", "true");
}

/** Ten valid questions; the correct answer of question n is `B${n}`. */
export function sampleCandidate(): CandidateQuiz {
  return {
    title: "Photosynthesis Basics",
    description: "How plants turn light into chemical energy.",
    questions: Array.from({ length: 10 }, (_, i) => {
      const n = i + 1;
      return {
        question_title: `Question ${n}?`,
        question_options: [`A${n}`, `B${n}`, `C${n}`, `D${n}`],
        answer: `B${n}`,
      };
    }),
  };
}

export function sampleNewQuiz(userId: string, title = "Photosynthesis Basics"): NewQuiz {
  const candidate = sampleCandidate();
  return {
    user_id: userId,
    title,
    description: candidate.description ?? "",
    video_url: "https://www.youtube.com/watch?v=abc123",
    questions: candidate.questions,
  };
}

export interface TestSession {
  user: UserRecord;
  cookie: string;
}

/** A stored user plus a Cookie header carrying a valid access token. */
export async function createSession(
  store: MemoryQuizStore,
  username: string
): Promise<TestSession> {
  const user = await store.createUser({
    username,
    email: `${username}@example.com`,
    password_hash: "unused",
  });
  const token = await issueToken(user.id, "access");
  return { user, cookie: `access_token=${token}` };
}

export function jsonRequest(
  method: string,
  body?: unknown,
  cookie?: string
): RequestInit {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (cookie) headers.Cookie = cookie;
  return {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

/** Name → raw Set-Cookie line for every cookie the response sets. */
export function setCookies(response: Response): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const line of response.headers.getSetCookie()) {
    const name = line.slice(0, line.indexOf("="));
    cookies[name] = line;
  }
  return cookies;
}

/** Value part of a Set-Cookie line. */
export function cookieValue(line: string): string {
  const pair = line.split(";")[0];
  return pair.slice(pair.indexOf("=") + 1);
}
