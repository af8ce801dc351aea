import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import {
  getBlacklistSweepIntervalMs,
  logConfigStatus,
  validateConfig,
} from "./services/config.js";
import { startBlacklistSweep } from "./services/token-blacklist.js";

// Validate configuration at startup
const configStatus = validateConfig();

const app = createApp(configStatus);

// Start server
const port = parseInt(process.env.PORT || "8080");

logConfigStatus(configStatus);
console.log(`TubeQuiz API running on port ${port}`);

if (configStatus.ready) {
  startBlacklistSweep(getBlacklistSweepIntervalMs());
}

serve({ fetch: app.fetch, port });
