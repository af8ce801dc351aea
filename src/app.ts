import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { attemptRoutes } from "./routes/attempts.js";
import { authRoutes } from "./routes/auth.js";
import { legalRoutes } from "./routes/legal.js";
import { quizRoutes } from "./routes/quizzes.js";
import { isAnthropicConfigured } from "./services/claude.js";
import { validateConfig, type ConfigStatus } from "./services/config.js";
import { isOpenAIConfigured } from "./services/transcriber.js";

export function createApp(configStatus: ConfigStatus = validateConfig()) {
  const app = new Hono();

  // Global middleware
  app.use("*", logger());
  app.use(
    "*",
    cors({
      origin: (origin) => {
        const allowed = (process.env.FRONTEND_URL || "http://localhost:5173").split(",");
        return allowed.includes(origin) ? origin : allowed[0];
      },
      credentials: true,
      allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    })
  );

  // Health check (no auth required), with config status for diagnostics
  app.get("/health", (c) =>
    c.json({
      status: configStatus.ready ? "ok" : "misconfigured",
      services: {
        supabase: configStatus.supabase,
        auth: configStatus.auth,
        anthropic: configStatus.anthropic,
        openai: configStatus.openai,
      },
      ...(configStatus.ready
        ? {}
        : { hint: "Copy .env.example to .env and set SUPABASE_URL, SUPABASE_SERVICE_KEY and JWT_SECRET" }),
    })
  );

  // Guard: return 503 on all /api/* routes when the store or token signing is not configured
  app.use("/api/*", async (c, next) => {
    if (!configStatus.ready) {
      return c.json(
        {
          detail: "Server is not configured.",
          missing: configStatus.missing.filter((v) =>
            ["SUPABASE_URL", "SUPABASE_SERVICE_KEY", "JWT_SECRET"].includes(v)
          ),
        },
        503
      );
    }
    await next();
  });

  // Guard: quiz creation needs both AI services
  app.use("/api/createQuiz", async (c, next) => {
    if (!isAnthropicConfigured() || !isOpenAIConfigured()) {
      return c.json(
        {
          detail:
            "Quiz creation is unavailable. ANTHROPIC_API_KEY and OPENAI_API_KEY must be configured.",
        },
        503
      );
    }
    await next();
  });

  // API routes
  app.route("/api", authRoutes);
  app.route("/api", quizRoutes);
  app.route("/api/attempts", attemptRoutes);
  app.route("/api", legalRoutes);

  app.notFound((c) => c.json({ detail: "Not found." }, 404));

  app.onError((err, c) => {
    console.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ detail: "Internal server error." }, 500);
  });

  return app;
}
