import { execFile } from "node:child_process";

// yt-dlp (plus ffmpeg for audio conversion) must be installed on the host.

function getExecutable(): string {
  return process.env.YTDLP_PATH || "yt-dlp";
}

/**
 * Run yt-dlp once and resolve with its stdout. Rejects on a non-zero exit or
 * when the timeout elapses (the child is killed).
 */
export function runYtDlp(args: string[], timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      getExecutable(),
      args,
      { timeout: timeoutMs, maxBuffer: 32 * 1024 * 1024, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim().split("\n").pop() || error.message;
          reject(new Error(`yt-dlp failed: ${detail}`, { cause: error }));
          return;
        }
        resolve(stdout);
      }
    );
  });
}
