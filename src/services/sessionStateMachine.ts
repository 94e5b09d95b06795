/**
 * ブラウザごとのセッション確立状態
 *
 *   no_session --auth_started--> pending
 *   pending --callback_accepted--> authenticated
 *   pending --callback_rejected--> no_session
 *   authenticated --session_expired--> no_session
 *
 * auth_started はどの状態からでも受け付ける（再認証）。
 */
export type SessionEstablishment =
  | { status: "no_session" }
  | { status: "pending"; stateToken: string }
  | { status: "authenticated"; sessionId: string };

export type SessionEvent =
  | { type: "auth_started"; stateToken: string }
  | { type: "callback_accepted"; sessionId: string }
  | { type: "callback_rejected" }
  | { type: "session_expired" };

export const NO_SESSION: SessionEstablishment = { status: "no_session" };

/**
 * 定義されていない遷移
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: SessionEstablishment["status"],
    public readonly event: SessionEvent["type"]
  ) {
    super(`Invalid session transition: ${from} --${event}-->`);
    this.name = "InvalidTransitionError";
  }
}

export function transition(
  current: SessionEstablishment,
  event: SessionEvent
): SessionEstablishment {
  switch (event.type) {
    case "auth_started":
      return { status: "pending", stateToken: event.stateToken };

    case "callback_accepted":
      if (current.status !== "pending") {
        throw new InvalidTransitionError(current.status, event.type);
      }
      return { status: "authenticated", sessionId: event.sessionId };

    case "callback_rejected":
      if (current.status !== "pending") {
        throw new InvalidTransitionError(current.status, event.type);
      }
      return NO_SESSION;

    case "session_expired":
      if (current.status !== "authenticated") {
        throw new InvalidTransitionError(current.status, event.type);
      }
      return NO_SESSION;

    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
