import fs from "fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors/errors";
import { stripMarkup } from "../corpus/text.cleaner";
import { Document, Question } from "../rag/types";

export const questionRecordSchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
});

export type QuestionRecord = z.infer<typeof questionRecordSchema>;

export const MIN_EXTRACTED_ANSWER_LENGTH = 11;

const PAIR_PATTERNS: RegExp[] = [
  /^\**Q:\s*(.+?)\**\s*A:\s*(.+(?:\n(?!\**Q:).+)*)/gm,
  /^\**В:\s*(.+?)\**\s*О:\s*(.+(?:\n(?!\**В:).+)*)/gm,
];

const HEADING_PATTERN = /^#{2,3}\s+([^#\n]+\?)\s*\n\s*([^\n#]+(?:\n(?!#{2,3}).+)*)/gm;

function toQuestion(record: QuestionRecord): Question {
  return { text: record.question, expectedAnswer: record.answer };
}

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parses a question set: either a JSON array or JSON Lines, each entry
 * `{ "question": ..., "answer": ... }`.
 */
export function parseQuestions(content: string, sourceName = "questions"): Question[] {
  const trimmed = content.trim();
  if (!trimmed) return [];

  if (trimmed.startsWith("[")) {
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (error) {
      throw new ConfigError(`${sourceName} is not valid JSON`, [errorMessage(error)]);
    }
    const parsed = z.array(questionRecordSchema).safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(`${sourceName} has invalid entries`, [describe(parsed.error)]);
    }
    return parsed.data.map(toQuestion);
  }

  const questions: Question[] = [];
  const lines = trimmed.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new ConfigError(`${sourceName}:${i + 1} is not valid JSON`, [errorMessage(error)]);
    }
    const parsed = questionRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(`${sourceName}:${i + 1} is not a question record`, [
        describe(parsed.error),
      ]);
    }
    questions.push(toQuestion(parsed.data));
  }
  return questions;
}

/** Serializes questions as JSON Lines that {@link parseQuestions} reads back. */
export function formatQuestions(questions: Question[]): string {
  return questions
    .map((q) => `${JSON.stringify({ question: q.text, answer: q.expectedAnswer })}\n`)
    .join("");
}

export async function loadQuestions(filePath: string): Promise<Question[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Questions file "${filePath}" cannot be read`, [], error);
  }
  return parseQuestions(content, filePath);
}

/**
 * Mines question/answer pairs written into the documents themselves:
 * `Q:`/`A:` and `В:`/`О:` pairs (optionally bold) and `##`/`###` headings
 * ending in a question mark followed by their paragraph. Answers of ten
 * characters or fewer are too short to score and are skipped.
 */
export function extractQuestions(documents: Document[]): Question[] {
  const seen = new Set<string>();
  const questions: Question[] = [];

  const collect = (rawQuestion: string, rawAnswer: string) => {
    const text = stripMarkup(rawQuestion);
    const expectedAnswer = stripMarkup(rawAnswer);
    if (!text || expectedAnswer.length < MIN_EXTRACTED_ANSWER_LENGTH) return;

    const key = `${text.toLowerCase()}\n${expectedAnswer.toLowerCase()}`;
    if (seen.has(key)) return;
    seen.add(key);
    questions.push({ text, expectedAnswer });
  };

  for (const document of documents) {
    for (const pattern of [...PAIR_PATTERNS, HEADING_PATTERN]) {
      for (const match of document.rawText.matchAll(pattern)) {
        collect(match[1], match[2]);
      }
    }
  }

  return questions;
}
