import { stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { getPipelineTimeouts } from "./config.js";
import { VideoDownloadError, errorMessage } from "./errors.js";
import { cleanupTempFile, createTempDir } from "./temp-files.js";
import { runYtDlp } from "./yt-dlp.js";

// ─── Types ────────────────────────────────────────────────────────────────────

export interface VideoMetadata {
  title: string;
  description: string;
  duration: number;
  thumbnail: string;
}

export const EMPTY_METADATA: Readonly<VideoMetadata> = {
  title: "",
  description: "",
  duration: 0,
  thumbnail: "",
};

const VideoInfoSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
});

// ─── URLs ─────────────────────────────────────────────────────────────────────

export const YOUTUBE_HOSTS = [
  "youtube.com",
  "www.youtube.com",
  "youtu.be",
  "m.youtube.com",
] as const;

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/** http(s) URL whose host (port included) is on the YouTube allow-list. */
export function isYouTubeUrl(value: string): boolean {
  const url = parseUrl(value);
  if (!url) return false;
  if (url.protocol !== "http:" && url.protocol !== "https:") return false;
  return (YOUTUBE_HOSTS as readonly string[]).includes(url.host);
}

export function extractYouTubeId(value: string): string | null {
  const url = parseUrl(value);
  if (!url) return null;

  if (url.hostname === "youtu.be") {
    return url.pathname.slice(1) || null;
  }

  if (!(YOUTUBE_HOSTS as readonly string[]).includes(url.hostname)) return null;

  if (url.pathname === "/watch") {
    return url.searchParams.get("v");
  }

  for (const prefix of ["/embed/", "/v/", "/shorts/"]) {
    if (url.pathname.startsWith(prefix)) {
      return url.pathname.split("/")[2] || null;
    }
  }

  return null;
}

// ─── yt-dlp calls ─────────────────────────────────────────────────────────────

// Compressed so that long videos stay under the transcription upload limit
export const AUDIO_FORMAT = "mp3";
export const AUDIO_QUALITY = "64K";
const AUDIO_FILE_NAME = `audio.${AUDIO_FORMAT}`;

/** Best audio stream, extracted and converted by ffmpeg to a fixed format and quality. */
export function buildDownloadArgs(outputTemplate: string, url: string): string[] {
  return [
    "--format", "bestaudio/best",
    "--extract-audio",
    "--audio-format", AUDIO_FORMAT,
    "--audio-quality", AUDIO_QUALITY,
    "--no-playlist",
    "--no-progress",
    "--quiet",
    "--output", outputTemplate,
    url,
  ];
}

/**
 * Title, description, duration and thumbnail of a video. Never throws: when
 * extraction fails the caller gets an all-empty record.
 */
export async function getVideoMetadata(url: string): Promise<VideoMetadata> {
  try {
    const stdout = await runYtDlp(
      ["--dump-single-json", "--skip-download", "--no-playlist", "--no-warnings", url],
      getPipelineTimeouts().metadataMs
    );
    const info = VideoInfoSchema.parse(JSON.parse(stdout));
    return {
      title: info.title ?? "",
      description: info.description ?? "",
      duration: info.duration ?? 0,
      thumbnail: info.thumbnail ?? "",
    };
  } catch (err: unknown) {
    console.warn(`Could not read metadata for ${url}: ${errorMessage(err)}`);
    return { ...EMPTY_METADATA };
  }
}

async function isFile(filePath: string): Promise<boolean> {
  return stat(filePath).then(
    (stats) => stats.isFile(),
    () => false
  );
}

/**
 * Download the audio track into a fresh temporary directory and return the
 * path of the converted file. Single attempt.
 */
export async function downloadAudio(url: string): Promise<string> {
  const tempDir = await createTempDir();
  const audioFile = path.join(tempDir, AUDIO_FILE_NAME);

  try {
    await runYtDlp(
      buildDownloadArgs(path.join(tempDir, "audio.%(ext)s"), url),
      getPipelineTimeouts().downloadMs
    );

    if (!(await isFile(audioFile))) {
      throw new Error("Audio file not found after download");
    }

    return audioFile;
  } catch (err: unknown) {
    await cleanupTempFile(audioFile);
    throw new VideoDownloadError(`Error downloading YouTube audio: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
