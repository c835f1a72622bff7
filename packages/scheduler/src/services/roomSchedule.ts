import pLimit from "p-limit";
import { SessionConflictError } from "../lib/errors.js";
import { scheduleBus, type ScheduleBus } from "../lib/events.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { byStart, sessionOverlapsWindow } from "../lib/overlap.js";
import type { Room, Session } from "../models.js";
import { SessionScheduler } from "./sessionScheduler.js";

export type CommitFn = (session: Session) => Promise<void>;

export type RoomScheduleOptions = {
  sessions?: Iterable<Session>;
  allowLeadingAdjacency?: boolean;
  logger?: Logger;
  bus?: ScheduleBus;
};

export class RoomSchedule {
  private booked: Session[];
  // One check-then-commit at a time per room.
  private readonly limit = pLimit(1);
  private readonly baseLogger: Logger;
  private readonly log: Logger;
  private readonly bus: ScheduleBus;
  private readonly allowLeadingAdjacency: boolean | undefined;

  constructor(
    readonly room: Room,
    options: RoomScheduleOptions = {}
  ) {
    this.baseLogger = options.logger ?? rootLogger;
    this.log = this.baseLogger.child({ roomId: room.id });
    this.bus = options.bus ?? scheduleBus;
    this.allowLeadingAdjacency = options.allowLeadingAdjacency;
    // Constructing the scheduler validates that every seeded session is in this room.
    this.booked = [...this.scheduler(options.sessions ?? []).sessionsInOrder()];
  }

  sessions() {
    return [...this.booked];
  }

  fits(candidate: Session) {
    return this.scheduler(this.booked).fits(candidate);
  }

  findConflicts(candidate: Session) {
    return this.scheduler(this.booked).findConflicts(candidate);
  }

  /**
   * Admit `candidate` if it fits, running `commit` (e.g. a persistence write)
   * before the session becomes visible. Calls for the same room never interleave.
   */
  admit(candidate: Session, commit?: CommitFn) {
    return this.limit(async () => {
      const conflicts = this.findConflicts(candidate);
      if (conflicts.length > 0) {
        const conflictingSessionIds = conflicts.map((s) => s.id);
        this.log.warn({ sessionId: candidate.id, conflictingSessionIds }, "session rejected");
        this.bus.emit({ type: "session_rejected", roomId: this.room.id, sessionId: candidate.id, conflictingSessionIds });
        throw new SessionConflictError(candidate.id, this.room.id, conflictingSessionIds);
      }

      if (commit) await commit(candidate);

      this.booked = [...this.booked, candidate].sort(byStart);
      this.log.info({ sessionId: candidate.id, startsAt: candidate.startsAt.toISOString() }, "session admitted");
      this.bus.emit({
        type: "session_admitted",
        roomId: this.room.id,
        sessionId: candidate.id,
        startsAt: candidate.startsAt.toISOString()
      });
      return candidate;
    });
  }

  withdraw(sessionId: string) {
    return this.limit(async () => {
      const remaining = this.booked.filter((s) => s.id !== sessionId);
      if (remaining.length === this.booked.length) return false;
      this.booked = remaining;
      this.log.info({ sessionId }, "session withdrawn");
      this.bus.emit({ type: "session_withdrawn", roomId: this.room.id, sessionId });
      return true;
    });
  }

  /** Sessions whose interval intersects the half-open window [start, end). */
  overlapping(start: Date, end: Date) {
    return this.booked.filter((s) => sessionOverlapsWindow(s, start, end));
  }

  private scheduler(sessions: Iterable<Session>) {
    return new SessionScheduler(this.room, sessions, {
      allowLeadingAdjacency: this.allowLeadingAdjacency,
      logger: this.baseLogger
    });
  }
}
