import { createFilm, createRoom, createSession, type Film, type Room } from "../src/models.js";

export const film = createFilm({ id: "film-1", title: "Night Harbor", duration_minutes: 120, genre: "drama" });
export const shortFilm = createFilm({ id: "film-2", title: "Short Reel", duration_minutes: 30 });
export const blankFilm = createFilm({ id: "film-0", title: "Test Card", duration_minutes: 0 });
export const room = createRoom({ id: "room-1", name: "Screen 1" });
export const otherRoom = createRoom({ id: "room-2", name: "Screen 2" });

export function sessionAt(
  startTime: string,
  opts: { id?: string; day?: string; film?: Film; room?: Room } = {}
) {
  return createSession({
    id: opts.id ?? `s-${opts.day ?? "2025-01-01"}-${startTime}`,
    start: { day: opts.day ?? "2025-01-01", start_time: startTime },
    film: opts.film ?? film,
    room: opts.room ?? room
  });
}
