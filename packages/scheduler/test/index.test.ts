import { describe, expect, it } from "vitest";
import { SessionScheduler, createFilm, createRoom, createSession, env } from "../src/index.js";

describe("package entry", () => {
  it("schedules through the public exports", () => {
    const film = createFilm({ id: "f", title: "Matinee", duration_minutes: 95 });
    const room = createRoom({ id: "r", name: "Hall" });
    const at = (start_time: string) => createSession({ start: { day: "2025-05-01", start_time }, film, room });

    const scheduler = new SessionScheduler(room, [at("14:00")]);
    expect(scheduler.fits(at("15:35"))).toBe(true);
    expect(scheduler.fits(at("15:34"))).toBe(false);
    expect(env.ALLOW_LEADING_ADJACENCY).toBe(false);
  });
});
