import type { Room, Session } from "../models.js";
import { RoomSchedule, type CommitFn, type RoomScheduleOptions } from "./roomSchedule.js";

/** Keeps one {@link RoomSchedule} per room and routes sessions by their room. */
export class Timetable {
  private readonly rooms = new Map<string, RoomSchedule>();

  constructor(private readonly options: Omit<RoomScheduleOptions, "sessions"> = {}) {}

  forRoom(room: Room) {
    let schedule = this.rooms.get(room.id);
    if (!schedule) {
      schedule = new RoomSchedule(room, this.options);
      this.rooms.set(room.id, schedule);
    }
    return schedule;
  }

  fits(candidate: Session) {
    return this.forRoom(candidate.room).fits(candidate);
  }

  admit(candidate: Session, commit?: CommitFn) {
    return this.forRoom(candidate.room).admit(candidate, commit);
  }

  sessions(roomId: string) {
    return this.rooms.get(roomId)?.sessions() ?? [];
  }
}
