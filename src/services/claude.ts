import Anthropic from "@anthropic-ai/sdk";
import { getPipelineTimeouts } from "./config.js";

let client: Anthropic | null = null;

/**
 * Check whether an Anthropic API key is configured (non-empty).
 * Does NOT prove the key is valid, only that one has been provided.
 */
export function isAnthropicConfigured(): boolean {
  return Boolean(process.env.ANTHROPIC_API_KEY);
}

function getClient(): Anthropic {
  if (!client) {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new Error(
        "Missing ANTHROPIC_API_KEY environment variable. Set it in .env (see .env.example)."
      );
    }
    // One attempt per request; a failed generation fails the quiz
    client = new Anthropic({
      apiKey,
      maxRetries: 0,
      timeout: getPipelineTimeouts().generationMs,
    });
  }
  return client;
}

export const QUIZ_MODEL = "claude-sonnet-4-5-20250929";

export async function askClaude(
  systemPrompt: string,
  userMessage: string,
  maxTokens: number = 8192
): Promise<string> {
  const anthropic = getClient();

  try {
    const response = await anthropic.messages.create({
      model: QUIZ_MODEL,
      max_tokens: maxTokens,
      system: systemPrompt,
      messages: [{ role: "user", content: userMessage }],
    });

    const block = response.content[0];
    if (!block || block.type !== "text") {
      throw new Error("Unexpected response type from Claude");
    }

    return block.text;
  } catch (err: unknown) {
    if (err instanceof Anthropic.AuthenticationError) {
      client = null;
      throw new Error(
        "Anthropic API authentication failed: the configured ANTHROPIC_API_KEY is invalid. " +
          "Check your .env file and restart the server.",
        { cause: err }
      );
    }
    throw err;
  }
}
