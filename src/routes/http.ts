import type { Context } from "hono";
import type { z } from "zod";
import { fieldErrors } from "../schemas.js";

export type BodyResult<T> = { ok: true; data: T } | { ok: false; response: Response };

/**
 * Parse the JSON body with a zod schema. On failure `response` is a ready 400:
 * `{ detail, errors }` with field errors, or just `{ detail }` when a fixed
 * message is given.
 */
export async function validateBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  options: { message?: string } = {}
): Promise<BodyResult<z.output<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ detail: "Invalid JSON body." }, 400) };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const response = options.message
      ? c.json({ detail: options.message }, 400)
      : c.json({ detail: "Invalid request data.", errors: fieldErrors(parsed.error) }, 400);
    return { ok: false, response };
  }

  return { ok: true, data: parsed.data };
}
