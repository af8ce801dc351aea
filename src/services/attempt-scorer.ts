import { getStore, type AttemptRecord, type QuestionRecord } from "./store.js";

export interface ScoreResult {
  /** Percentage of correct answers, rounded to two decimals. */
  score: number;
  correctAnswers: number;
  totalQuestions: number;
}

export interface QuestionResult {
  question_id: string;
  question: string;
  options: string[];
  correct_answer: string;
  user_answer: string | null;
  is_correct: boolean;
}

type AnswerMap = Record<string, string>;

function answerFor(answers: AnswerMap, questionId: string): string | null {
  return Object.prototype.hasOwnProperty.call(answers, questionId)
    ? answers[questionId]
    : null;
}

/**
 * Compare submitted answers (keyed by question id) with the stored answers.
 * Pure, so it can be called any number of times before completion.
 */
export function calculateScore(questions: QuestionRecord[], answers: AnswerMap): ScoreResult {
  const totalQuestions = questions.length;
  const correctAnswers = questions.filter(
    (question) => answerFor(answers, question.id) === question.answer
  ).length;

  const score =
    totalQuestions > 0 ? Math.round((correctAnswers / totalQuestions) * 10000) / 100 : 0;

  return { score, correctAnswers, totalQuestions };
}

export function formatPercentage(score: number): string {
  return `${score.toFixed(1)}%`;
}

export function isCompleted(attempt: AttemptRecord): boolean {
  return attempt.completed_at !== null;
}

export function buildQuestionResults(
  questions: QuestionRecord[],
  answers: AnswerMap
): QuestionResult[] {
  return questions.map((question) => {
    const userAnswer = answerFor(answers, question.id);
    return {
      question_id: question.id,
      question: question.question_title,
      options: question.question_options,
      correct_answer: question.answer,
      user_answer: userAnswer,
      is_correct: userAnswer === question.answer,
    };
  });
}

export type CompletionOutcome =
  | { status: "completed"; attempt: AttemptRecord; result: ScoreResult }
  | { status: "already_completed" };

/**
 * Score an attempt and stamp score and completion time together. Completion
 * happens once: a completed attempt is rejected instead of re-scored, and the
 * store's conditional write catches a concurrent completion as well.
 */
export async function completeAttempt(
  attempt: AttemptRecord,
  questions: QuestionRecord[],
  now: Date = new Date()
): Promise<CompletionOutcome> {
  if (isCompleted(attempt)) {
    return { status: "already_completed" };
  }

  const result = calculateScore(questions, attempt.answers);
  const completed = await getStore().completeAttempt(attempt.id, result.score, now);

  if (!completed) {
    return { status: "already_completed" };
  }
  return { status: "completed", attempt: completed, result };
}
