import type { Session } from "../models.js";
import { sessionEnd } from "../models.js";

export type Interval = { start: Date; end: Date };

// Half-open [start, end): touching endpoints do not overlap.
export function intervalsOverlap(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date) {
  return aStart < bEnd && bStart < aEnd;
}

export function sessionInterval(session: Session): Interval {
  return { start: session.startsAt, end: sessionEnd(session) };
}

export function sessionOverlapsWindow(session: Session, start: Date, end: Date) {
  const interval = sessionInterval(session);
  return intervalsOverlap(interval.start, interval.end, start, end);
}

export function byStart(a: Session, b: Session) {
  return a.startsAt.getTime() - b.startsAt.getTime();
}
