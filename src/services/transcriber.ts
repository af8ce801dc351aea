import fs from "node:fs";
import { stat } from "node:fs/promises";
import OpenAI from "openai";
import { getPipelineTimeouts } from "./config.js";
import { TranscriptionError, errorMessage } from "./errors.js";

export const TRANSCRIPTION_MODEL = "whisper-1";

/** The transcription endpoint rejects larger uploads. */
export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

let client: OpenAI | null = null;

export function isOpenAIConfigured(): boolean {
  return Boolean(process.env.OPENAI_API_KEY);
}

function getClient(): OpenAI {
  if (!client) {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error(
        "Missing OPENAI_API_KEY environment variable. Set it in .env (see .env.example)."
      );
    }
    client = new OpenAI({
      apiKey,
      maxRetries: 0,
      timeout: getPipelineTimeouts().transcriptionMs,
    });
  }
  return client;
}

/**
 * Transcribe a whole audio file in one blocking call. Files over the upload
 * limit are refused before anything is sent.
 */
export async function transcribeAudio(audioFilePath: string): Promise<string> {
  try {
    const { size } = await stat(audioFilePath);
    if (size > MAX_UPLOAD_BYTES) {
      const megabytes = (size / (1024 * 1024)).toFixed(1);
      throw new TranscriptionError(
        `Audio file is too large to transcribe (${megabytes} MB, limit 25 MB)`
      );
    }

    const result = await getClient().audio.transcriptions.create({
      file: fs.createReadStream(audioFilePath),
      model: TRANSCRIPTION_MODEL,
    });
    return result.text;
  } catch (err: unknown) {
    if (err instanceof TranscriptionError) throw err;
    throw new TranscriptionError(`Error transcribing audio: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
