import type { AttemptRecord, QuizRecord, UserRecord } from "./store.js";

// Response bodies. Internal columns (owner ids, question positions, password hashes) stay out.

export function toUserResponse(user: UserRecord) {
  return { id: user.id, username: user.username, email: user.email };
}

export function toQuizResponse(quiz: QuizRecord) {
  return {
    id: quiz.id,
    title: quiz.title,
    description: quiz.description,
    video_url: quiz.video_url,
    created_at: quiz.created_at,
    updated_at: quiz.updated_at,
    questions: quiz.questions.map((question) => ({
      id: question.id,
      question_title: question.question_title,
      question_options: question.question_options,
      answer: question.answer,
    })),
  };
}

/** List entry without question content. */
export function toQuizSummary(quiz: QuizRecord) {
  return {
    id: quiz.id,
    title: quiz.title,
    description: quiz.description,
    video_url: quiz.video_url,
    created_at: quiz.created_at,
    updated_at: quiz.updated_at,
    questions_count: quiz.questions.length,
  };
}

export function toAttemptResponse(attempt: AttemptRecord) {
  return {
    id: attempt.id,
    quiz: attempt.quiz_id,
    answers: attempt.answers,
    score: attempt.score,
    completed_at: attempt.completed_at,
    created_at: attempt.created_at,
    updated_at: attempt.updated_at,
  };
}
