import { z } from "zod";
import { validatePasswordStrength } from "./services/auth.js";
import { isYouTubeUrl } from "./services/video-source.js";

// ============================================
// Request Schemas
// ============================================

const REQUIRED = { required_error: "This field is required." };

const YouTubeUrlSchema = z
  .string(REQUIRED)
  .trim()
  .refine(isYouTubeUrl, "URL must be a valid YouTube URL.");

export const RegisterRequestSchema = z
  .object({
    username: z
      .string(REQUIRED)
      .trim()
      .min(1, "This field may not be blank.")
      .max(150, "Ensure this field has no more than 150 characters.")
      .regex(
        /^[\w.@+-]+$/,
        "Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters."
      ),
    email: z.string(REQUIRED).trim().email("Enter a valid email address."),
    password: z.string(REQUIRED).min(1, "This field may not be blank."),
  })
  .superRefine((data, ctx) => {
    for (const message of validatePasswordStrength(data.password, data.username)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["password"], message });
    }
  });

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

// Username trimmed the same way as on registration
export const LoginRequestSchema = z.object({
  username: z.string(REQUIRED).trim().min(1, "This field may not be blank."),
  password: z.string(REQUIRED).min(1, "This field may not be blank."),
});

export const CreateQuizRequestSchema = z.object({
  url: YouTubeUrlSchema,
});

/** PUT body; PATCH accepts any subset of it. */
export const UpdateQuizRequestSchema = z.object({
  title: z.string().max(255, "Ensure this field has no more than 255 characters.").optional(),
  description: z.string().optional(),
  video_url: YouTubeUrlSchema,
});

export const PatchQuizRequestSchema = UpdateQuizRequestSchema.partial();

export const SaveAnswerRequestSchema = z.object({
  question_id: z.union([z.string().min(1), z.number()]).transform(String),
  answer: z.string().min(1),
});

/** Flatten zod issues into `{ field: [messages] }`; issues without a path go under `non_field_errors`. */
export function fieldErrors(error: z.ZodError): Record<string, string[]> {
  const flattened = error.flatten();
  const errors: Record<string, string[]> = {};

  for (const [field, messages] of Object.entries(flattened.fieldErrors)) {
    if (messages && messages.length > 0) errors[field] = messages;
  }
  if (flattened.formErrors.length > 0) {
    errors.non_field_errors = flattened.formErrors;
  }

  return errors;
}
