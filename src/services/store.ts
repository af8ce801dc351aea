import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { getSupabaseAdmin } from "./supabase.js";
import { StoreError } from "./errors.js";

// ─── Row shapes ───────────────────────────────────────────────────────────────

const UserRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  password_hash: z.string(),
  created_at: z.string(),
});

const QuestionRowSchema = z.object({
  id: z.string(),
  quiz_id: z.string(),
  question_title: z.string(),
  question_options: z.array(z.string()),
  answer: z.string(),
  position: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

const QuizRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  description: z.string(),
  video_url: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  questions: z.array(QuestionRowSchema),
});

const AttemptRowSchema = z.object({
  id: z.string(),
  quiz_id: z.string(),
  user_id: z.string(),
  answers: z.record(z.string()),
  score: z.number().nullable(),
  completed_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type UserRecord = z.infer<typeof UserRowSchema>;
export type QuestionRecord = z.infer<typeof QuestionRowSchema>;
export type QuizRecord = z.infer<typeof QuizRowSchema>;
export type AttemptRecord = z.infer<typeof AttemptRowSchema>;

export interface NewUser {
  username: string;
  email: string;
  password_hash: string;
}

export interface NewQuestion {
  question_title: string;
  question_options: string[];
  answer: string;
}

export interface NewQuiz {
  user_id: string;
  title: string;
  description: string;
  video_url: string;
  questions: NewQuestion[];
}

export interface QuizChanges {
  title?: string;
  description?: string;
  video_url?: string;
}

/**
 * Everything the API needs from persistence. Quizzes always come back with
 * their questions, ordered by position.
 */
export interface QuizStore {
  createUser(user: NewUser): Promise<UserRecord>;
  findUserById(id: string): Promise<UserRecord | null>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;

  /** Writes the quiz and all of its questions atomically. */
  createQuizWithQuestions(quiz: NewQuiz): Promise<QuizRecord>;
  /** Newest first. */
  listQuizzes(userId: string, options?: { createdSince?: Date }): Promise<QuizRecord[]>;
  getQuiz(id: string): Promise<QuizRecord | null>;
  updateQuiz(id: string, changes: QuizChanges): Promise<QuizRecord>;
  deleteQuiz(id: string): Promise<void>;

  createAttempt(quizId: string, userId: string): Promise<AttemptRecord>;
  getAttempt(id: string): Promise<AttemptRecord | null>;
  /** Upserts a single entry of the answer map. */
  saveAttemptAnswer(id: string, questionId: string, answer: string): Promise<AttemptRecord>;
  /** Returns null when the attempt was already completed. */
  completeAttempt(id: string, score: number, completedAt: Date): Promise<AttemptRecord | null>;

  blacklistToken(token: string, expiresAt: Date): Promise<void>;
  isTokenBlacklisted(token: string): Promise<boolean>;
  /** Returns the number of rows removed. */
  deleteExpiredTokens(now: Date): Promise<number>;
}

// ─── Supabase implementation ──────────────────────────────────────────────────

const QUIZ_COLUMNS = "*, questions(*)";

function orderQuestions(quiz: QuizRecord): QuizRecord {
  quiz.questions.sort((a, b) => a.position - b.position);
  return quiz;
}

function parseQuiz(row: unknown): QuizRecord {
  return orderQuestions(QuizRowSchema.parse(row));
}

function fail(action: string, error: { message: string; code?: string }): never {
  throw new StoreError(`Failed to ${action}: ${error.message}`, {
    cause: error,
    code: error.code,
  });
}

export class SupabaseQuizStore implements QuizStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async createUser(user: NewUser): Promise<UserRecord> {
    const { data, error } = await this.supabase
      .from("users")
      .insert(user)
      .select()
      .single();

    if (error) fail("create user", error);
    return UserRowSchema.parse(data);
  }

  findUserById(id: string): Promise<UserRecord | null> {
    return this.findUser("id", id);
  }

  findUserByUsername(username: string): Promise<UserRecord | null> {
    return this.findUser("username", username);
  }

  findUserByEmail(email: string): Promise<UserRecord | null> {
    return this.findUser("email", email);
  }

  private async findUser(
    column: "id" | "username" | "email",
    value: string
  ): Promise<UserRecord | null> {
    const { data, error } = await this.supabase
      .from("users")
      .select("*")
      .eq(column, value)
      .maybeSingle();

    if (error) fail("load user", error);
    return data ? UserRowSchema.parse(data) : null;
  }

  async createQuizWithQuestions(quiz: NewQuiz): Promise<QuizRecord> {
    // A single Postgres function inserts the quiz and its questions in one transaction
    const { data, error } = await this.supabase.rpc("create_quiz_with_questions", {
      p_user_id: quiz.user_id,
      p_title: quiz.title,
      p_description: quiz.description,
      p_video_url: quiz.video_url,
      p_questions: quiz.questions,
    });

    if (error) fail("create quiz", error);

    const quizId = z.string().parse(data);
    const created = await this.getQuiz(quizId);
    if (!created) {
      throw new StoreError(`Quiz ${quizId} was created but could not be loaded`);
    }
    return created;
  }

  async listQuizzes(
    userId: string,
    options: { createdSince?: Date } = {}
  ): Promise<QuizRecord[]> {
    let query = this.supabase
      .from("quizzes")
      .select(QUIZ_COLUMNS)
      .eq("user_id", userId);

    if (options.createdSince) {
      query = query.gte("created_at", options.createdSince.toISOString());
    }

    const { data, error } = await query.order("created_at", { ascending: false });

    if (error) fail("list quizzes", error);
    return z.array(QuizRowSchema).parse(data ?? []).map(orderQuestions);
  }

  async getQuiz(id: string): Promise<QuizRecord | null> {
    const { data, error } = await this.supabase
      .from("quizzes")
      .select(QUIZ_COLUMNS)
      .eq("id", id)
      .maybeSingle();

    if (error) fail("load quiz", error);
    return data ? parseQuiz(data) : null;
  }

  async updateQuiz(id: string, changes: QuizChanges): Promise<QuizRecord> {
    const { error } = await this.supabase
      .from("quizzes")
      .update({ ...changes, updated_at: new Date().toISOString() })
      .eq("id", id);

    if (error) fail("update quiz", error);

    const updated = await this.getQuiz(id);
    if (!updated) {
      throw new StoreError(`Quiz ${id} disappeared during update`);
    }
    return updated;
  }

  async deleteQuiz(id: string): Promise<void> {
    const { error } = await this.supabase.from("quizzes").delete().eq("id", id);
    if (error) fail("delete quiz", error);
  }

  async createAttempt(quizId: string, userId: string): Promise<AttemptRecord> {
    const { data, error } = await this.supabase
      .from("quiz_attempts")
      .insert({ quiz_id: quizId, user_id: userId, answers: {} })
      .select()
      .single();

    if (error) fail("start attempt", error);
    return AttemptRowSchema.parse(data);
  }

  async getAttempt(id: string): Promise<AttemptRecord | null> {
    const { data, error } = await this.supabase
      .from("quiz_attempts")
      .select("*")
      .eq("id", id)
      .maybeSingle();

    if (error) fail("load attempt", error);
    return data ? AttemptRowSchema.parse(data) : null;
  }

  async saveAttemptAnswer(
    id: string,
    questionId: string,
    answer: string
  ): Promise<AttemptRecord> {
    // Merged inside Postgres so concurrent saves never overwrite each other
    const { data, error } = await this.supabase.rpc("save_attempt_answer", {
      p_attempt_id: id,
      p_question_id: questionId,
      p_answer: answer,
    });

    if (error) fail("save answer", error);
    return AttemptRowSchema.parse(data);
  }

  async completeAttempt(
    id: string,
    score: number,
    completedAt: Date
  ): Promise<AttemptRecord | null> {
    const { data, error } = await this.supabase
      .from("quiz_attempts")
      .update({
        score,
        completed_at: completedAt.toISOString(),
        updated_at: completedAt.toISOString(),
      })
      .eq("id", id)
      .is("completed_at", null)
      .select()
      .maybeSingle();

    if (error) fail("complete attempt", error);
    return data ? AttemptRowSchema.parse(data) : null;
  }

  async blacklistToken(token: string, expiresAt: Date): Promise<void> {
    const { error } = await this.supabase
      .from("blacklisted_tokens")
      .upsert(
        { token, expires_at: expiresAt.toISOString() },
        { onConflict: "token", ignoreDuplicates: true }
      );

    if (error) fail("blacklist token", error);
  }

  async isTokenBlacklisted(token: string): Promise<boolean> {
    const { count, error } = await this.supabase
      .from("blacklisted_tokens")
      .select("id", { count: "exact", head: true })
      .eq("token", token);

    if (error) fail("check token blacklist", error);
    return (count ?? 0) > 0;
  }

  async deleteExpiredTokens(now: Date): Promise<number> {
    const { count, error } = await this.supabase
      .from("blacklisted_tokens")
      .delete({ count: "exact" })
      .lt("expires_at", now.toISOString());

    if (error) fail("prune token blacklist", error);
    return count ?? 0;
  }
}

let store: QuizStore | null = null;

export function getStore(): QuizStore {
  if (!store) {
    store = new SupabaseQuizStore(getSupabaseAdmin());
  }
  return store;
}
