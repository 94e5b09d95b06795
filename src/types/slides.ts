import type { SlidesRequest } from "./google";

/**
 * テキスト分割の設定
 */
export type SplitterConfig =
  | { kind: "newline" }
  | { kind: "empty_line" }
  | { kind: "max_words"; maxWords: number }
  | { kind: "max_chars"; maxChars: number };

export type SplitterKind = SplitterConfig["kind"];

export const SPLITTER_KINDS = [
  "newline",
  "empty_line",
  "max_words",
  "max_chars",
] as const satisfies readonly SplitterKind[];

/**
 * スライド作成リクエスト（バリデーション後）
 */
export interface CreateSlidesInput {
  title: string;
  content: string;
  splitter: SplitterConfig;
}

/**
 * batchUpdate に載せる 1 操作
 */
export interface SlideOperation {
  index: number; // batch 内の順序
  slideObjectId: string;
  kind: "createSlide" | "insertText";
  request: SlidesRequest;
}

/**
 * 作成結果
 */
export interface PresentationResult {
  presentationId: string;
  presentationUrl: string;
}

/**
 * POST /api/create-slides のレスポンス
 */
export interface CreateSlidesResponse {
  presentation_id: string;
  presentation_url: string;
  message: string;
}
