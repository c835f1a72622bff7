import { ZodError } from "zod";

export class SessionConflictError extends Error {
  constructor(
    public sessionId: string,
    public roomId: string,
    public conflictingSessionIds: string[]
  ) {
    super("SESSION_CONFLICT");
  }
}

/** Raised when a session reaches a scheduler or schedule that holds a different room. */
export class CrossRoomSessionError extends Error {
  constructor(
    public sessionId: string,
    public expectedRoomId: string,
    public actualRoomId: string
  ) {
    super("CROSS_ROOM_SESSION");
  }
}

export type ErrorBody = { error: { code: string; message: string } & Record<string, unknown> };

export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof SessionConflictError) {
    return {
      error: {
        code: err.message,
        message: "Session overlaps an existing session in the room",
        sessionId: err.sessionId,
        roomId: err.roomId,
        conflictingSessionIds: err.conflictingSessionIds
      }
    };
  }
  if (err instanceof CrossRoomSessionError) {
    return {
      error: {
        code: err.message,
        message: "Session belongs to another room",
        sessionId: err.sessionId,
        expectedRoomId: err.expectedRoomId,
        actualRoomId: err.actualRoomId
      }
    };
  }
  if (err instanceof ZodError) {
    return { error: { code: "VALIDATION_ERROR", message: "Invalid input", details: err.issues } };
  }
  return { error: { code: "INTERNAL", message: "Internal Error" } };
}
