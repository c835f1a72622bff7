import { randomUUID } from "node:crypto";
import {
  FilmCreateSchema,
  RoomCreateSchema,
  SessionStartSchema,
  type FilmCreate,
  type RoomCreate,
  type SessionStart
} from "@showtime/shared";
import { Duration, TimeOfDay, addDuration } from "./lib/time.js";

export type Film = Readonly<{ id: string; title: string; duration: Duration; genre: string | null }>;
export type Room = Readonly<{ id: string; name: string }>;

export type Session = Readonly<{
  id: string;
  startsAt: Date;
  film: Film;
  room: Room;
}>;

export function createFilm(input: FilmCreate): Film {
  const data = FilmCreateSchema.parse(input);
  return Object.freeze({
    id: data.id,
    title: data.title,
    duration: Duration.ofMinutes(data.duration_minutes),
    genre: data.genre ?? null
  });
}

export function createRoom(input: RoomCreate): Room {
  const data = RoomCreateSchema.parse(input);
  return Object.freeze({ id: data.id, name: data.name });
}

function resolveStart(input: SessionStart) {
  const data = SessionStartSchema.parse(input);
  if ("starts_at" in data) return new Date(data.starts_at);
  return TimeOfDay.parse(data.start_time).atDay(data.day);
}

export function createSession(params: { id?: string; start: SessionStart; film: Film; room: Room }): Session {
  const { film, room } = params;
  return Object.freeze({
    id: params.id ?? randomUUID(),
    startsAt: resolveStart(params.start),
    film,
    room
  });
}

export function sessionEnd(session: Session) {
  return addDuration(session.startsAt, session.film.duration);
}
