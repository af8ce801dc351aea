import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "./app.js";
import { validateConfig } from "./services/config.js";
import { getStore } from "./services/store.js";
import { MemoryQuizStore } from "./test/memory-store.js";
import { stubTestEnv } from "./test/fixtures.js";

vi.mock("./services/store.js", () => ({
  getStore: vi.fn(),
}));

describe("app", () => {
  beforeEach(() => {
    stubTestEnv();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.mocked(getStore).mockReturnValue(new MemoryQuizStore());
  });

  it("reports service status on /health", async () => {
    const res = await createApp().request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      services: { supabase: true, auth: true, anthropic: true, openai: true },
    });
  });

  it("refuses API calls while the store or signing secret is missing", async () => {
    vi.stubEnv("JWT_SECRET", "");
    const app = createApp(validateConfig());

    const res = await app.request("/api/quizzes");
    const health = await app.request("/health");

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ detail: "Server is not configured.", missing: ["JWT_SECRET"] });
    expect(await health.json()).toMatchObject({ status: "misconfigured" });
  });

  it("answers unknown routes with 404", async () => {
    const res = await createApp().request("/api/nothing-here");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: "Not found." });
  });

  it("serves the legal pages without authentication", async () => {
    vi.stubEnv("OPERATOR_NAME", "Quiz Operator Ltd.");
    const app = createApp();

    const privacy = await app.request("/api/privacy-policy");
    const notice = await app.request("/api/legal-notice");

    expect(privacy.status).toBe(200);
    expect(await privacy.json()).toMatchObject({ title: "Privacy Policy" });
    expect(await notice.json()).toMatchObject({
      title: "Legal Notice",
      operator: { name: "Quiz Operator Ltd.", address: "", email: "" },
    });
  });
});
