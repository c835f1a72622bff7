import { EventEmitter } from "node:events";

export type ScheduleEvent =
  | { type: "session_admitted"; roomId: string; sessionId: string; startsAt: string }
  | { type: "session_rejected"; roomId: string; sessionId: string; conflictingSessionIds: string[] }
  | { type: "session_withdrawn"; roomId: string; sessionId: string };

export type ScheduleEventType = ScheduleEvent["type"];
export type ScheduleEventOf<T extends ScheduleEventType> = Extract<ScheduleEvent, { type: T }>;

const ANY = "*";

/** Room schedule notifications, keyed by event type. Listener registration returns an unsubscribe. */
export class ScheduleBus {
  private emitter = new EventEmitter();

  on<T extends ScheduleEventType>(type: T, listener: (ev: ScheduleEventOf<T>) => void) {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  onAny(listener: (ev: ScheduleEvent) => void) {
    this.emitter.on(ANY, listener);
    return () => this.emitter.off(ANY, listener);
  }

  emit(ev: ScheduleEvent) {
    this.emitter.emit(ev.type, ev);
    this.emitter.emit(ANY, ev);
  }
}

export const scheduleBus = new ScheduleBus();
