import { google } from "googleapis";
import type { slides_v1 } from "googleapis";
import type { PresentationApiClient, SlidesRequest } from "../types/google";
import {
  PartialApplyUnknownError,
  RemoteRejectedError,
  RemoteUnavailableError,
} from "../utils/errors";

// 接続確立前に失敗したことが確実なエラーコード
const NOT_SENT_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "CERT_HAS_EXPIRED",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

export type RemoteFailure =
  | { kind: "rejected"; status: number }
  | { kind: "timeout" }
  | { kind: "not_sent"; code: string }
  | { kind: "unknown" };

/**
 * gaxios のエラーを分類
 */
export function classifyRemoteFailure(
  error: unknown,
  timedOut: boolean
): RemoteFailure {
  const status = responseStatus(error);
  if (status !== undefined) {
    return { kind: "rejected", status };
  }
  if (timedOut) {
    return { kind: "timeout" };
  }
  const code = errorCode(error);
  if (code !== undefined && NOT_SENT_CODES.has(code)) {
    return { kind: "not_sent", code };
  }
  return { kind: "unknown" };
}

function responseStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("response" in error)) {
    return undefined;
  }
  const { response } = error;
  if (
    typeof response !== "object" ||
    response === null ||
    !("status" in response) ||
    typeof response.status !== "number"
  ) {
    return undefined;
  }
  return response.status;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 分類済みの失敗（クライアント内部でのみ使う）
 */
class RemoteCallFailure extends Error {
  constructor(
    public readonly failure: RemoteFailure,
    public readonly original: unknown
  ) {
    super(errorMessage(original));
    this.name = "RemoteCallFailure";
  }
}

export interface GoogleSlidesClientOptions {
  // API のベース URL（既定は https://slides.googleapis.com/）
  rootUrl?: string;
}

/**
 * Google Slides API クライアント
 * 自動リトライはしない
 * @see https://developers.google.com/slides/api/reference/rest
 */
export class GoogleSlidesClient implements PresentationApiClient {
  private readonly slides: slides_v1.Slides;

  constructor(
    accessToken: string,
    private readonly timeoutMs: number,
    options: GoogleSlidesClientOptions = {}
  ) {
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });
    this.slides = google.slides({
      version: "v1",
      auth,
      retry: false,
      ...(options.rootUrl ? { rootUrl: options.rootUrl } : {}),
    });
  }

  /**
   * プレゼンテーションを作成
   */
  async createPresentation(title: string): Promise<{ presentationId: string }> {
    let presentation: slides_v1.Schema$Presentation;
    try {
      const response = await this.send((signal) =>
        this.slides.presentations.create({ requestBody: { title } }, { signal })
      );
      presentation = response.data;
    } catch (error) {
      throw toRemoteError("create presentation", error);
    }

    if (!presentation.presentationId) {
      throw new RemoteRejectedError(
        "Create presentation response did not include a presentation id"
      );
    }

    return { presentationId: presentation.presentationId };
  }

  /**
   * 操作をまとめて送信（送信順に適用される）
   */
  async batchUpdate(
    presentationId: string,
    requests: SlidesRequest[]
  ): Promise<void> {
    try {
      await this.send((signal) =>
        this.slides.presentations.batchUpdate(
          { presentationId, requestBody: { requests } },
          { signal }
        )
      );
    } catch (error) {
      // 送信後に接続が切れた場合は反映済みかどうか分からない
      if (
        error instanceof RemoteCallFailure &&
        error.failure.kind === "unknown"
      ) {
        throw new PartialApplyUnknownError(
          `Connection lost after sending batch update: ${error.message}`,
          presentationId
        );
      }
      throw toRemoteError("batch update", error);
    }
  }

  private async send<T>(call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      return await call(controller.signal);
    } catch (error) {
      throw new RemoteCallFailure(classifyRemoteFailure(error, timedOut), error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function toRemoteError(operation: string, error: unknown): Error {
  if (!(error instanceof RemoteCallFailure)) {
    return new RemoteUnavailableError(
      `Slides API request failed during ${operation}: ${errorMessage(error)}`
    );
  }

  const { failure, message } = error;
  switch (failure.kind) {
    case "rejected":
      return new RemoteRejectedError(
        `Slides API rejected ${operation} (${failure.status}): ${message}`,
        failure.status
      );
    case "timeout":
      return new RemoteUnavailableError(
        `Slides API timed out during ${operation}`
      );
    case "not_sent":
      return new RemoteUnavailableError(
        `Slides API unreachable during ${operation} (${failure.code}): ${message}`
      );
    case "unknown":
      return new RemoteUnavailableError(
        `Slides API request failed during ${operation}: ${message}`
      );
    default: {
      const unreachable: never = failure;
      return unreachable;
    }
  }
}
