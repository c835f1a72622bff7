export { env } from "./config.js";
export { logger, type Logger } from "./lib/logger.js";
export { ScheduleBus, scheduleBus, type ScheduleEvent, type ScheduleEventOf, type ScheduleEventType } from "./lib/events.js";
export { SessionConflictError, CrossRoomSessionError, toErrorBody, type ErrorBody } from "./lib/errors.js";
export { intervalsOverlap, sessionInterval, type Interval } from "./lib/overlap.js";
export { Duration, TimeOfDay, addDuration } from "./lib/time.js";
export { createFilm, createRoom, createSession, sessionEnd, type Film, type Room, type Session } from "./models.js";
export { SessionScheduler, type SessionSchedulerOptions } from "./services/sessionScheduler.js";
export { RoomSchedule, type CommitFn, type RoomScheduleOptions } from "./services/roomSchedule.js";
export { Timetable } from "./services/timetable.js";
