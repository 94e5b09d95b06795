import type { PresentationApiClient } from "../types/google";
import type { PresentationResult, SlideOperation } from "../types/slides";

const PRESENTATION_URL_BASE = "https://docs.google.com/presentation/d";

/**
 * スライドのオブジェクト ID（クライアント側で決める）
 * Slides API の制約: 5〜50 文字、英数字とアンダースコア
 */
export function slideObjectId(slideNumber: number): string {
  return `slide_${slideNumber}`;
}

export function bodyObjectId(slideNumber: number): string {
  return `${slideObjectId(slideNumber)}_body`;
}

export function presentationUrl(presentationId: string): string {
  return `${PRESENTATION_URL_BASE}/${encodeURIComponent(presentationId)}/edit`;
}

/**
 * セグメントごとに createSlide → insertText の順で操作を組み立てる
 */
export function buildSlideOperations(segments: string[]): SlideOperation[] {
  const operations: SlideOperation[] = [];

  segments.forEach((segment, i) => {
    const slideNumber = i + 1;
    const slideId = slideObjectId(slideNumber);
    const bodyId = bodyObjectId(slideNumber);

    operations.push({
      index: operations.length,
      slideObjectId: slideId,
      kind: "createSlide",
      request: {
        createSlide: {
          objectId: slideId,
          slideLayoutReference: { predefinedLayout: "TITLE_AND_BODY" },
          placeholderIdMappings: [
            {
              layoutPlaceholder: { type: "BODY", index: 0 },
              objectId: bodyId,
            },
          ],
        },
      },
    });

    operations.push({
      index: operations.length,
      slideObjectId: slideId,
      kind: "insertText",
      request: {
        insertText: {
          objectId: bodyId,
          insertionIndex: 0,
          text: segment,
        },
      },
    });
  });

  return operations;
}

/**
 * スライド作成サービス
 */
export class SlideDeckService {
  constructor(private readonly api: PresentationApiClient) {}

  /**
   * プレゼンテーションを作成してスライドを追加
   */
  async build(title: string, segments: string[]): Promise<PresentationResult> {
    // 1. プレゼンテーション作成
    const { presentationId } = await this.api.createPresentation(title);

    console.log("[Slides] Presentation created", {
      presentationId,
      slides: segments.length,
    });

    // 2. 操作を組み立てて順序どおりに一括送信
    const operations = buildSlideOperations(segments);
    const requests = [...operations]
      .sort((a, b) => a.index - b.index)
      .map((operation) => operation.request);

    await this.api.batchUpdate(presentationId, requests);

    // 3. 結果
    return {
      presentationId,
      presentationUrl: presentationUrl(presentationId),
    };
  }
}
