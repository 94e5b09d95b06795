import type { SplitterConfig, SplitterKind } from "../types/slides";
import { InvalidConfigError } from "../utils/errors";

export const DEFAULT_MAX_WORDS = 50;
export const DEFAULT_MAX_CHARS = 500;

/**
 * 分割方式の説明（GET /api/splitters）
 */
export interface SplitterDescriptor {
  type: SplitterKind;
  name: string;
  description: string;
  defaults?: { max_words?: number; max_chars?: number };
}

export const SPLITTERS: readonly SplitterDescriptor[] = [
  {
    type: "newline",
    name: "New Line Splitter",
    description: "Splits text by individual lines",
  },
  {
    type: "empty_line",
    name: "Empty Line Splitter",
    description: "Splits text by empty lines (paragraphs)",
  },
  {
    type: "max_words",
    name: "Max Words Splitter",
    description: "Splits text by maximum word count per slide",
    defaults: { max_words: DEFAULT_MAX_WORDS },
  },
  {
    type: "max_chars",
    name: "Max Characters Splitter",
    description: "Splits text by maximum character count per slide",
    defaults: { max_chars: DEFAULT_MAX_CHARS },
  },
];

/**
 * テキストをスライド単位に分割
 * 空のセグメントは返さない。順序は元テキストの出現順
 */
export function splitText(text: string, config: SplitterConfig): string[] {
  const normalized = text.replace(/\r\n?/g, "\n");

  switch (config.kind) {
    case "newline":
      return splitByNewline(normalized);
    case "empty_line":
      return splitByEmptyLine(normalized);
    case "max_words":
      return splitByMaxWords(
        normalized,
        requirePositiveInteger(config.maxWords, "max_words")
      );
    case "max_chars":
      return splitByMaxChars(
        normalized,
        requirePositiveInteger(config.maxChars, "max_chars")
      );
    default: {
      const unreachable: never = config;
      return unreachable;
    }
  }
}

function requirePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigError(`${field} must be a positive integer`);
  }
  return value;
}

function splitByNewline(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function splitByEmptyLine(text: string): string[] {
  // 空白だけの行も空行とみなす
  return text
    .split(/\n[^\S\n]*\n/)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function splitByMaxWords(text: string, maxWords: number): string[] {
  const all = words(text);
  const segments: string[] = [];

  for (let i = 0; i < all.length; i += maxWords) {
    segments.push(all.slice(i, i + maxWords).join(" "));
  }

  return segments;
}

/**
 * 単語境界で詰め、1 単語が max_chars を超える場合だけ強制的に分割
 * 長さはコードポイント単位
 */
function splitByMaxChars(text: string, maxChars: number): string[] {
  const segments: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  const flush = () => {
    if (current.length > 0) {
      segments.push(current.join(""));
    }
    current = [];
    currentLength = 0;
  };

  for (const word of words(text)) {
    const chars = Array.from(word);

    if (chars.length > maxChars) {
      flush();
      for (let i = 0; i < chars.length; i += maxChars) {
        const piece = chars.slice(i, i + maxChars);
        if (piece.length === maxChars) {
          segments.push(piece.join(""));
        } else {
          current = piece;
          currentLength = piece.length;
        }
      }
      continue;
    }

    if (currentLength === 0) {
      current = [...chars];
      currentLength = chars.length;
    } else if (currentLength + 1 + chars.length <= maxChars) {
      current.push(" ", ...chars);
      currentLength += 1 + chars.length;
    } else {
      flush();
      current = [...chars];
      currentLength = chars.length;
    }
  }

  flush();
  return segments;
}
