// Centralized environment configuration & validation.
// Call validateConfig() at startup to log what's missing.

export interface ConfigStatus {
  supabase: boolean;
  auth: boolean;
  anthropic: boolean;
  openai: boolean;
  ready: boolean; // true when the minimum required vars are present
  missing: string[];
}

export function validateConfig(): ConfigStatus {
  const missing: string[] = [];

  const supabase =
    Boolean(process.env.SUPABASE_URL) &&
    Boolean(process.env.SUPABASE_SERVICE_KEY);

  const auth = Boolean(process.env.JWT_SECRET);
  const anthropic = Boolean(process.env.ANTHROPIC_API_KEY);
  const openai = Boolean(process.env.OPENAI_API_KEY);

  if (!process.env.SUPABASE_URL) missing.push("SUPABASE_URL");
  if (!process.env.SUPABASE_SERVICE_KEY) missing.push("SUPABASE_SERVICE_KEY");
  if (!process.env.JWT_SECRET) missing.push("JWT_SECRET");
  if (!process.env.ANTHROPIC_API_KEY) missing.push("ANTHROPIC_API_KEY");
  if (!process.env.OPENAI_API_KEY) missing.push("OPENAI_API_KEY");

  // Quiz creation additionally needs both AI keys, checked per route
  const ready = supabase && auth;

  return { supabase, auth, anthropic, openai, ready, missing };
}

export function logConfigStatus(status: ConfigStatus): void {
  console.log("");
  console.log("=== Configuration Status ===");
  console.log(`  Supabase : ${status.supabase ? "OK" : "MISSING"}`);
  console.log(`  JWT      : ${status.auth ? "OK" : "MISSING"}`);
  console.log(`  Anthropic: ${status.anthropic ? "OK" : "MISSING (quiz creation disabled)"}`);
  console.log(`  OpenAI   : ${status.openai ? "OK" : "MISSING (quiz creation disabled)"}`);

  if (status.missing.length > 0) {
    console.log("");
    console.log("  Missing environment variables:");
    for (const v of status.missing) {
      console.log(`    - ${v}`);
    }
  }

  if (!status.ready) {
    console.log("");
    console.log(
      "  ⚠ API is NOT ready: Supabase credentials and JWT_SECRET are required."
    );
    console.log("  Copy .env.example to .env and fill in your values.");
  }

  console.log("============================");
  console.log("");
}

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/** Local/debug mode turns off the Secure flag on auth cookies. */
export function isDebug(): boolean {
  const raw = (process.env.DEBUG || "").toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (!secret) {
    throw new Error("Missing JWT_SECRET environment variable. See .env.example.");
  }
  return secret;
}

export function getTokenLifetimes() {
  return {
    accessSeconds: readIntEnv("ACCESS_TOKEN_TTL_SECONDS", 300),
    refreshSeconds: readIntEnv("REFRESH_TOKEN_TTL_SECONDS", 86400),
  };
}

/** Upper bounds for each blocking call into an external service. */
export function getPipelineTimeouts() {
  return {
    metadataMs: readIntEnv("METADATA_TIMEOUT_MS", 30_000),
    downloadMs: readIntEnv("DOWNLOAD_TIMEOUT_MS", 600_000),
    transcriptionMs: readIntEnv("TRANSCRIPTION_TIMEOUT_MS", 600_000),
    generationMs: readIntEnv("GENERATION_TIMEOUT_MS", 120_000),
  };
}

export function getBlacklistSweepIntervalMs(): number {
  return readIntEnv("BLACKLIST_SWEEP_INTERVAL_MS", 3_600_000);
}
