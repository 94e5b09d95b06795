/**
 * カスタムエラーの基底クラス
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = "INTERNAL_ERROR",
    public details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * 設定不足エラー（OAuth クライアント設定など）
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, "CONFIGURATION_ERROR");
  }
}

// ---- 認証系 ----

/**
 * State が存在しない・一致しない（CSRF 対策）
 */
export class CsrfMismatchError extends AppError {
  constructor(message: string = "OAuth state mismatch") {
    super(message, 400, "CSRF_MISMATCH");
  }
}

/**
 * State の有効期限切れ
 */
export class StateExpiredError extends AppError {
  constructor(message: string = "OAuth state expired") {
    super(message, 400, "STATE_EXPIRED");
  }
}

/**
 * 認可コードとトークンの交換に失敗
 */
export class TokenExchangeFailedError extends AppError {
  constructor(message: string) {
    super(message, 502, "TOKEN_EXCHANGE_FAILED");
  }
}

/**
 * 有効なセッションがない
 */
export class UnauthenticatedError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, 401, "UNAUTHENTICATED");
  }
}

// ---- バリデーション系 ----

/**
 * バリデーションエラー
 */
export class ValidationError extends AppError {
  constructor(message: string, code: string = "VALIDATION_ERROR") {
    super(message, 400, code);
  }
}

/**
 * 分割設定が不正
 */
export class InvalidConfigError extends ValidationError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
  }
}

/**
 * リクエストの形式が不正
 */
export class MalformedRequestError extends ValidationError {
  constructor(message: string) {
    super(message, "MALFORMED_REQUEST");
  }
}

// ---- Google Slides API 系 ----

/**
 * レスポンスを受け取る前の通信失敗・タイムアウト
 */
export class RemoteUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 502, "REMOTE_UNAVAILABLE");
  }
}

/**
 * API がリクエストを拒否した（non-2xx・不正なレスポンス）
 */
export class RemoteRejectedError extends AppError {
  constructor(message: string, public remoteStatus?: number) {
    super(
      message,
      502,
      "REMOTE_REJECTED",
      remoteStatus === undefined ? {} : { remote_status: remoteStatus }
    );
  }
}

/**
 * 送信後に通信が切れ、反映されたか分からない
 * 再実行するとスライドが重複する可能性がある
 */
export class PartialApplyUnknownError extends AppError {
  constructor(message: string, presentationId: string) {
    super(message, 502, "PARTIAL_APPLY_UNKNOWN", {
      presentation_id: presentationId,
      possible_duplicate: true,
    });
  }
}

// ---- ストレージ系 ----

/**
 * KV バックエンドにアクセスできない
 */
export class BackendUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503, "BACKEND_UNAVAILABLE");
  }
}
