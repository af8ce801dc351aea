import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildQuestionResults,
  calculateScore,
  completeAttempt,
  formatPercentage,
} from "./attempt-scorer.js";
import { getStore, type QuestionRecord } from "./store.js";
import { MemoryQuizStore } from "../test/memory-store.js";
import { sampleNewQuiz } from "../test/fixtures.js";

vi.mock("./store.js", () => ({
  getStore: vi.fn(),
}));

function question(id: string, answer: string): QuestionRecord {
  return {
    id,
    quiz_id: "quiz-1",
    question_title: `What is ${id}?`,
    question_options: [answer, "x", "y", "z"],
    answer,
    position: 0,
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
  };
}

const questions = [question("q1", "a"), question("q2", "b"), question("q3", "c")];

describe("calculateScore", () => {
  it("scores exact matches by question id", () => {
    expect(calculateScore(questions, { q1: "a", q2: "wrong", q3: "c" })).toEqual({
      score: 66.67,
      correctAnswers: 2,
      totalQuestions: 3,
    });
  });

  it("gives 100 for all correct and 0 for none", () => {
    expect(calculateScore(questions, { q1: "a", q2: "b", q3: "c" }).score).toBe(100);
    expect(calculateScore(questions, { q1: "x", q2: "x", q3: "x" }).score).toBe(0);
  });

  it("treats unanswered questions as wrong", () => {
    expect(calculateScore(questions, { q1: "a" })).toEqual({
      score: 33.33,
      correctAnswers: 1,
      totalQuestions: 3,
    });
  });

  it("does not trim or case-fold answers", () => {
    expect(calculateScore([question("q1", "Paris")], { q1: "paris " }).correctAnswers).toBe(0);
  });

  it("returns 0 for a quiz without questions", () => {
    expect(calculateScore([], { q1: "a" })).toEqual({
      score: 0,
      correctAnswers: 0,
      totalQuestions: 0,
    });
  });

  it("ignores answers for questions outside the quiz", () => {
    expect(calculateScore(questions, { other: "a", toString: "a" }).correctAnswers).toBe(0);
  });

  it("gives the same result on repeated calls", () => {
    const answers = { q1: "a", q3: "c" };
    expect(calculateScore(questions, answers)).toEqual(calculateScore(questions, answers));
  });
});

describe("formatPercentage", () => {
  it("uses one decimal", () => {
    expect(formatPercentage(100)).toBe("100.0%");
    expect(formatPercentage(66.67)).toBe("66.7%");
    expect(formatPercentage(0)).toBe("0.0%");
  });
});

describe("buildQuestionResults", () => {
  it("lists every question with the user's answer and correctness", () => {
    expect(buildQuestionResults(questions.slice(0, 2), { q1: "a" })).toEqual([
      {
        question_id: "q1",
        question: "What is q1?",
        options: ["a", "x", "y", "z"],
        correct_answer: "a",
        user_answer: "a",
        is_correct: true,
      },
      {
        question_id: "q2",
        question: "What is q2?",
        options: ["b", "x", "y", "z"],
        correct_answer: "b",
        user_answer: null,
        is_correct: false,
      },
    ]);
  });
});

describe("completeAttempt", () => {
  let store: MemoryQuizStore;

  beforeEach(() => {
    store = new MemoryQuizStore();
    vi.mocked(getStore).mockReturnValue(store);
  });

  it("stores score and completion time together", async () => {
    const quiz = await store.createQuizWithQuestions(sampleNewQuiz("user-1"));
    const attempt = await store.createAttempt(quiz.id, "user-1");
    for (const q of quiz.questions) {
      await store.saveAttemptAnswer(attempt.id, q.id, q.answer);
    }
    const answered = await store.getAttempt(attempt.id);
    const now = new Date("2026-02-03T04:05:06.000Z");

    const outcome = await completeAttempt(answered ?? attempt, quiz.questions, now);

    expect(outcome.status).toBe("completed");
    const stored = await store.getAttempt(attempt.id);
    expect(stored?.score).toBe(100);
    expect(stored?.completed_at).toBe("2026-02-03T04:05:06.000Z");
  });

  it("rejects a second completion without re-scoring", async () => {
    const quiz = await store.createQuizWithQuestions(sampleNewQuiz("user-1"));
    const attempt = await store.createAttempt(quiz.id, "user-1");

    const first = await completeAttempt(attempt, quiz.questions);
    const completed = await store.getAttempt(attempt.id);
    const second = await completeAttempt(completed ?? attempt, quiz.questions);

    expect(first.status).toBe("completed");
    expect(second).toEqual({ status: "already_completed" });
    expect((await store.getAttempt(attempt.id))?.score).toBe(0);
  });

  it("rejects a stale copy of an attempt that was completed meanwhile", async () => {
    const quiz = await store.createQuizWithQuestions(sampleNewQuiz("user-1"));
    const attempt = await store.createAttempt(quiz.id, "user-1");

    await completeAttempt(attempt, quiz.questions);
    const outcome = await completeAttempt(attempt, quiz.questions);

    expect(outcome).toEqual({ status: "already_completed" });
  });
});
