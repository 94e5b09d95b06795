import { z } from "zod";
import { SPLITTER_KINDS } from "../types/slides";
import type { CreateSlidesInput, SplitterConfig } from "../types/slides";
import {
  DEFAULT_MAX_CHARS,
  DEFAULT_MAX_WORDS,
} from "../services/textSplitter";
import { MalformedRequestError } from "./errors";

/**
 * POST /api/create-slides のリクエストボディ
 */
export const CreateSlidesRequestSchema = z.object({
  title: z.string().trim().min(1, "title must not be empty"),
  content: z.string(),
  splitter_type: z.enum(SPLITTER_KINDS),
  splitter_config: z
    .object({
      max_words: z.number().optional(),
      max_chars: z.number().optional(),
    })
    .optional(),
});

export type CreateSlidesRequest = z.infer<typeof CreateSlidesRequestSchema>;

/**
 * 分割設定を組み立てる（値の範囲チェックは splitText で行う）
 */
export function toSplitterConfig(
  type: CreateSlidesRequest["splitter_type"],
  config: CreateSlidesRequest["splitter_config"] = {}
): SplitterConfig {
  switch (type) {
    case "newline":
      return { kind: "newline" };
    case "empty_line":
      return { kind: "empty_line" };
    case "max_words":
      return { kind: "max_words", maxWords: config.max_words ?? DEFAULT_MAX_WORDS };
    case "max_chars":
      return { kind: "max_chars", maxChars: config.max_chars ?? DEFAULT_MAX_CHARS };
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

/**
 * リクエストボディを検証
 */
export function parseCreateSlidesRequest(body: unknown): CreateSlidesInput {
  const parsed = CreateSlidesRequestSchema.safeParse(body);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "body";
    throw new MalformedRequestError(
      `Invalid request body: ${field}: ${issue?.message ?? "invalid"}`
    );
  }

  return {
    title: parsed.data.title,
    content: parsed.data.content,
    splitter: toSplitterConfig(
      parsed.data.splitter_type,
      parsed.data.splitter_config
    ),
  };
}
