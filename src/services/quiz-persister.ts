import type { CandidateQuiz } from "./quiz-generator.js";
import { getStore, type QuizRecord } from "./store.js";
import type { VideoMetadata } from "./video-source.js";

export const DEFAULT_QUIZ_TITLE = "Untitled Quiz";

export function resolveQuizTitle(candidate: CandidateQuiz, metadata: VideoMetadata): string {
  return candidate.title?.trim() || metadata.title.trim() || DEFAULT_QUIZ_TITLE;
}

/**
 * Store a validated quiz for its owner. The quiz row and its questions are
 * written in a single transaction, so a failure leaves nothing behind.
 */
export async function persistQuiz(
  userId: string,
  url: string,
  candidate: CandidateQuiz,
  metadata: VideoMetadata
): Promise<QuizRecord> {
  return getStore().createQuizWithQuestions({
    user_id: userId,
    title: resolveQuizTitle(candidate, metadata),
    description: candidate.description ?? "",
    video_url: url,
    questions: candidate.questions.map((q) => ({
      question_title: q.question_title,
      question_options: q.question_options,
      answer: q.answer,
    })),
  });
}
