import { env } from "../config.js";
import { CrossRoomSessionError } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { byStart, sessionInterval } from "../lib/overlap.js";
import type { Room, Session } from "../models.js";

export type SessionSchedulerOptions = {
  /**
   * Accept a candidate that ends exactly when an existing session starts.
   * A candidate that starts exactly when an existing session ends is always accepted.
   */
  allowLeadingAdjacency?: boolean;
  logger?: Logger;
};

/**
 * Admission check for one room.
 *
 * The sessions handed to the constructor must all belong to `room`; filtering a
 * wider list down to one room is the caller's job and a session from another
 * room is rejected with {@link CrossRoomSessionError}.
 *
 * The scheduler is a pure predicate over the list it was given. It does not add
 * admitted sessions anywhere, so callers that check and then insert from more
 * than one place must hold a lock across both steps (see `RoomSchedule`).
 */
export class SessionScheduler {
  private readonly sessions: readonly Session[];
  private readonly allowLeadingAdjacency: boolean;
  private readonly log: Logger;

  constructor(
    readonly room: Room,
    sessions: Iterable<Session>,
    options: SessionSchedulerOptions = {}
  ) {
    const list = [...sessions];
    for (const session of list) this.assertRoom(session);
    this.sessions = list;
    this.allowLeadingAdjacency = options.allowLeadingAdjacency ?? env.ALLOW_LEADING_ADJACENCY;
    this.log = (options.logger ?? rootLogger).child({ roomId: room.id });
  }

  fits(candidate: Session) {
    this.assertRoom(candidate);
    for (const existing of this.sessions) {
      if (!this.admissible(existing, candidate)) {
        this.log.debug({ sessionId: candidate.id, conflictsWith: existing.id }, "session does not fit");
        return false;
      }
    }
    return true;
  }

  sessionsInOrder() {
    return [...this.sessions].sort(byStart);
  }

  /** Every existing session the candidate cannot coexist with, in start order. */
  findConflicts(candidate: Session) {
    this.assertRoom(candidate);
    return this.sessions.filter((existing) => !this.admissible(existing, candidate)).sort(byStart);
  }

  private admissible(existing: Session, candidate: Session) {
    const e = sessionInterval(existing);
    const c = sessionInterval(candidate);
    // Sessions sharing a start always clash, zero-length ones included.
    if (c.start.getTime() === e.start.getTime()) return false;
    if (c.start < e.start) {
      return this.allowLeadingAdjacency ? c.end <= e.start : c.end < e.start;
    }
    return e.end <= c.start;
  }

  private assertRoom(session: Session) {
    if (session.room.id !== this.room.id) {
      throw new CrossRoomSessionError(session.id, this.room.id, session.room.id);
    }
  }
}
