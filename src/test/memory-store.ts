import crypto from "node:crypto";
import type {
  AttemptRecord,
  NewQuiz,
  NewUser,
  QuizChanges,
  QuizRecord,
  QuizStore,
  UserRecord,
} from "../services/store.js";

/**
 * In-process QuizStore for tests. Returns copies so callers cannot mutate
 * stored rows, like rows coming back from the database.
 */
export class MemoryQuizStore implements QuizStore {
  users = new Map<string, UserRecord>();
  quizzes = new Map<string, QuizRecord>();
  attempts = new Map<string, AttemptRecord>();
  blacklist = new Map<string, Date>();

  /** Advances on every write so ordering by created_at is stable. */
  private clock = Date.parse("2026-01-01T00:00:00.000Z");

  private timestamp(): string {
    this.clock += 1000;
    return new Date(this.clock).toISOString();
  }

  async createUser(user: NewUser): Promise<UserRecord> {
    const record: UserRecord = { id: crypto.randomUUID(), created_at: this.timestamp(), ...user };
    this.users.set(record.id, record);
    return { ...record };
  }

  async findUserById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const user = [...this.users.values()].find((u) => u.username === username);
    return user ? { ...user } : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const user = [...this.users.values()].find((u) => u.email === email);
    return user ? { ...user } : null;
  }

  async createQuizWithQuestions(quiz: NewQuiz): Promise<QuizRecord> {
    const id = crypto.randomUUID();
    const now = this.timestamp();
    const record: QuizRecord = {
      id,
      user_id: quiz.user_id,
      title: quiz.title,
      description: quiz.description,
      video_url: quiz.video_url,
      created_at: now,
      updated_at: now,
      questions: quiz.questions.map((question, position) => ({
        id: crypto.randomUUID(),
        quiz_id: id,
        question_title: question.question_title,
        question_options: [...question.question_options],
        answer: question.answer,
        position,
        created_at: now,
        updated_at: now,
      })),
    };
    this.quizzes.set(id, record);
    return structuredClone(record);
  }

  /** Insert a quiz with an explicit creation time. */
  seedQuiz(quiz: NewQuiz, createdAt: string): QuizRecord {
    const id = crypto.randomUUID();
    const record: QuizRecord = {
      id,
      user_id: quiz.user_id,
      title: quiz.title,
      description: quiz.description,
      video_url: quiz.video_url,
      created_at: createdAt,
      updated_at: createdAt,
      questions: quiz.questions.map((question, position) => ({
        id: crypto.randomUUID(),
        quiz_id: id,
        ...question,
        position,
        created_at: createdAt,
        updated_at: createdAt,
      })),
    };
    this.quizzes.set(id, record);
    return structuredClone(record);
  }

  async listQuizzes(
    userId: string,
    options: { createdSince?: Date } = {}
  ): Promise<QuizRecord[]> {
    const since = options.createdSince?.getTime() ?? Number.NEGATIVE_INFINITY;
    return [...this.quizzes.values()]
      .filter((quiz) => quiz.user_id === userId && Date.parse(quiz.created_at) >= since)
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at))
      .map((quiz) => structuredClone(quiz));
  }

  async getQuiz(id: string): Promise<QuizRecord | null> {
    const quiz = this.quizzes.get(id);
    return quiz ? structuredClone(quiz) : null;
  }

  async updateQuiz(id: string, changes: QuizChanges): Promise<QuizRecord> {
    const quiz = this.quizzes.get(id);
    if (!quiz) throw new Error(`Quiz ${id} not found`);

    if (changes.title !== undefined) quiz.title = changes.title;
    if (changes.description !== undefined) quiz.description = changes.description;
    if (changes.video_url !== undefined) quiz.video_url = changes.video_url;
    quiz.updated_at = this.timestamp();

    return structuredClone(quiz);
  }

  async deleteQuiz(id: string): Promise<void> {
    this.quizzes.delete(id);
    for (const [attemptId, attempt] of this.attempts) {
      if (attempt.quiz_id === id) this.attempts.delete(attemptId);
    }
  }

  async createAttempt(quizId: string, userId: string): Promise<AttemptRecord> {
    const now = this.timestamp();
    const record: AttemptRecord = {
      id: crypto.randomUUID(),
      quiz_id: quizId,
      user_id: userId,
      answers: {},
      score: null,
      completed_at: null,
      created_at: now,
      updated_at: now,
    };
    this.attempts.set(record.id, record);
    return structuredClone(record);
  }

  async getAttempt(id: string): Promise<AttemptRecord | null> {
    const attempt = this.attempts.get(id);
    return attempt ? structuredClone(attempt) : null;
  }

  async saveAttemptAnswer(
    id: string,
    questionId: string,
    answer: string
  ): Promise<AttemptRecord> {
    const attempt = this.attempts.get(id);
    if (!attempt) throw new Error(`Attempt ${id} not found`);

    attempt.answers[questionId] = answer;
    attempt.updated_at = this.timestamp();
    return structuredClone(attempt);
  }

  async completeAttempt(
    id: string,
    score: number,
    completedAt: Date
  ): Promise<AttemptRecord | null> {
    const attempt = this.attempts.get(id);
    if (!attempt || attempt.completed_at !== null) return null;

    attempt.score = score;
    attempt.completed_at = completedAt.toISOString();
    attempt.updated_at = completedAt.toISOString();
    return structuredClone(attempt);
  }

  async blacklistToken(token: string, expiresAt: Date): Promise<void> {
    if (!this.blacklist.has(token)) this.blacklist.set(token, expiresAt);
  }

  async isTokenBlacklisted(token: string): Promise<boolean> {
    return this.blacklist.has(token);
  }

  async deleteExpiredTokens(now: Date): Promise<number> {
    let removed = 0;
    for (const [token, expiresAt] of this.blacklist) {
      if (expiresAt.getTime() < now.getTime()) {
        this.blacklist.delete(token);
        removed++;
      }
    }
    return removed;
  }
}
