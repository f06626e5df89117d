// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace SceneWebSocketErrors {
  export const HANDSHAKE_FAILED_ERROR_TYPE = "HANDSHAKE_FAILED";
  export const FRAME_TOO_LARGE_ERROR_TYPE = "FRAME_TOO_LARGE";
  export const UNKNOWN_OPCODE_ERROR_TYPE = "UNKNOWN_OPCODE";
  export const TRANSPORT_LOST_ERROR_TYPE = "TRANSPORT_LOST";
}

export type SceneWebSocketErrorType =
  | typeof SceneWebSocketErrors.HANDSHAKE_FAILED_ERROR_TYPE
  | typeof SceneWebSocketErrors.FRAME_TOO_LARGE_ERROR_TYPE
  | typeof SceneWebSocketErrors.UNKNOWN_OPCODE_ERROR_TYPE
  | typeof SceneWebSocketErrors.TRANSPORT_LOST_ERROR_TYPE;

export class SceneWebSocketError extends Error {
  constructor(
    public errorType: SceneWebSocketErrorType,
    message: string,
  ) {
    super(message);
    this.name = "SceneWebSocketError";
  }
}

/**
 * Raised by a waiting operation when its abort signal fires. Shutdown is not a failure, so
 * callers stop quietly when they see this.
 */
export class CancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}
