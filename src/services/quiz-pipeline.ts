import { generateQuizFromTranscript } from "./quiz-generator.js";
import { persistQuiz } from "./quiz-persister.js";
import type { QuizRecord } from "./store.js";
import { cleanupTempFile } from "./temp-files.js";
import { transcribeAudio } from "./transcriber.js";
import { downloadAudio, getVideoMetadata } from "./video-source.js";

export type PipelineStage =
  | "started"
  | "metadata_fetched"
  | "audio_downloaded"
  | "transcribed"
  | "generated"
  | "persisted"
  | "cleaned_up";

function logStage(stage: PipelineStage, url: string): void {
  console.log(`[quiz-pipeline] ${stage} ${url}`);
}

/**
 * URL → metadata → audio file → transcript → validated quiz → stored quiz.
 * Strictly sequential, no retries. Once the audio is on disk it is removed on
 * every exit path before the result (or the original error) leaves here.
 */
export async function createQuizFromVideo(userId: string, url: string): Promise<QuizRecord> {
  logStage("started", url);

  const metadata = await getVideoMetadata(url);
  logStage("metadata_fetched", url);

  const audioFile = await downloadAudio(url);
  logStage("audio_downloaded", url);

  try {
    const transcript = await transcribeAudio(audioFile);
    logStage("transcribed", url);

    const candidate = await generateQuizFromTranscript(transcript, metadata.title);
    logStage("generated", url);

    const quiz = await persistQuiz(userId, url, candidate, metadata);
    logStage("persisted", url);

    return quiz;
  } finally {
    await cleanupTempFile(audioFile);
    logStage("cleaned_up", url);
  }
}
