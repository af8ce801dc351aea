import { askClaude } from "./claude.js";
import {
  QuizGenerationError,
  QuizResponseParseError,
  QuizStructureError,
  errorMessage,
} from "./errors.js";

// ─── Types ────────────────────────────────────────────────────────────────────

export interface CandidateQuestion {
  question_title: string;
  question_options: string[];
  answer: string;
}

/** Model output that passed validateQuizStructure, not yet persisted. */
export interface CandidateQuiz {
  title?: string;
  description?: string;
  questions: CandidateQuestion[];
}

export const QUESTIONS_PER_QUIZ = 10;
export const OPTIONS_PER_QUESTION = 4;

// ─── Prompt ───────────────────────────────────────────────────────────────────

const QUIZ_SYSTEM_PROMPT =
  "You write multiple-choice quizzes about video transcripts. You answer with a single JSON object and nothing else.";

const QUIZ_STRUCTURE_TEMPLATE = `{
  "title": "Create a concise quiz title based on the topic of the transcript.",
  "description": "Summarize the transcript in no more than 150 characters. Do not include any quiz questions or answers.",
  "questions": [
    {
      "question_title": "The question goes here.",
      "question_options": ["Option A", "Option B", "Option C", "Option D"],
      "answer": "The correct answer from the above options"
    },
    ...
    (exactly ${QUESTIONS_PER_QUIZ} questions)
  ]
}`;

const QUIZ_REQUIREMENTS = `Requirements:
- The quiz must contain exactly ${QUESTIONS_PER_QUIZ} questions.
- Each question must have exactly ${OPTIONS_PER_QUESTION} distinct answer options.
- Only one correct answer is allowed per question, and it must be copied verbatim from 'question_options'.
- The output must be valid JSON and parsable as-is with JSON.parse.
- Do not include explanations, comments, or any text outside the JSON.`;

export function buildQuizPrompt(transcript: string, titleHint = ""): string {
  const videoLine = titleHint ? `\nThe video is titled "${titleHint}".\n` : "";

  return `Based on the following transcript, generate a quiz in valid JSON format.
${videoLine}
The quiz must follow this exact structure:

${QUIZ_STRUCTURE_TEMPLATE}

${QUIZ_REQUIREMENTS}

Transcript:
${transcript}`;
}

// ─── Response handling ────────────────────────────────────────────────────────

/** Remove a leading ```json (or bare ```) fence and a trailing ``` fence. */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice("```json".length);
  } else if (cleaned.startsWith("```")) {
    cleaned = cleaned.slice("```".length);
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -"```".length);
  }
  return cleaned.trim();
}

export function parseQuizResponse(text: string): unknown {
  const cleaned = stripCodeFences(text);
  try {
    return JSON.parse(cleaned);
  } catch (err: unknown) {
    throw new QuizResponseParseError(`AI response was not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown[]): value is string[] {
  return value.every((item) => typeof item === "string");
}

/**
 * Accept exactly 10 questions, each with exactly 4 string options and an
 * answer taken from its own options. The first violation is reported with
 * the 1-based position of the question; nothing is repaired.
 */
export function validateQuizStructure(data: unknown): CandidateQuiz {
  if (!isRecord(data) || !Array.isArray(data.questions)) {
    throw new QuizStructureError("Invalid quiz structure: questions must be a list");
  }

  if (data.questions.length !== QUESTIONS_PER_QUIZ) {
    throw new QuizStructureError(`Quiz must have exactly ${QUESTIONS_PER_QUIZ} questions`);
  }

  const questions = data.questions.map((question: unknown, index): CandidateQuestion => {
    const position = index + 1;

    if (!isRecord(question)) {
      throw new QuizStructureError(`Question ${position}: must be an object`);
    }

    const options = question.question_options;
    if (!Array.isArray(options)) {
      throw new QuizStructureError(`Question ${position}: options must be a list`);
    }
    if (options.length !== OPTIONS_PER_QUESTION) {
      throw new QuizStructureError(
        `Question ${position}: must have exactly ${OPTIONS_PER_QUESTION} options`
      );
    }
    if (!isStringArray(options)) {
      throw new QuizStructureError(`Question ${position}: options must be strings`);
    }

    const answer = question.answer;
    if (typeof answer !== "string" || !options.includes(answer)) {
      throw new QuizStructureError(`Question ${position}: answer must be one of the options`);
    }

    if (typeof question.question_title !== "string") {
      throw new QuizStructureError(`Question ${position}: question_title must be a string`);
    }

    return {
      question_title: question.question_title,
      question_options: options,
      answer,
    };
  });

  return {
    title: typeof data.title === "string" ? data.title : undefined,
    description: typeof data.description === "string" ? data.description : undefined,
    questions,
  };
}

// ─── Generation ───────────────────────────────────────────────────────────────

/**
 * One model call, then fence stripping, JSON parsing and structural
 * validation. Parse and shape errors keep their own types; anything else is
 * wrapped in a QuizGenerationError.
 */
export async function generateQuizFromTranscript(
  transcript: string,
  titleHint = ""
): Promise<CandidateQuiz> {
  try {
    const responseText = await askClaude(
      QUIZ_SYSTEM_PROMPT,
      buildQuizPrompt(transcript, titleHint)
    );
    return validateQuizStructure(parseQuizResponse(responseText));
  } catch (err: unknown) {
    if (err instanceof QuizGenerationError) throw err;
    throw new QuizGenerationError(`Error generating quiz: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
