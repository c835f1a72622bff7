import { z } from "zod";

export const TimeOfDayString = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, "expected HH:MM or HH:MM:SS");

export const ISODate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((value) => {
    const d = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().startsWith(value);
  }, "invalid calendar date");

export const ISODateTime = z
  .string()
  .datetime({ offset: true })
  .or(z.string().datetime());

export const NonNegativeSpan = z.number().finite().nonnegative();

export const FilmCreateSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  duration_minutes: NonNegativeSpan,
  genre: z.string().optional().nullable()
});
export type FilmCreate = z.infer<typeof FilmCreateSchema>;

export const RoomCreateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1)
});
export type RoomCreate = z.infer<typeof RoomCreateSchema>;

// A session starts either at an absolute instant or at a wall-clock time on a given day.
export const SessionStartSchema = z.union([
  z.object({ starts_at: ISODateTime }),
  z.object({ day: ISODate, start_time: TimeOfDayString })
]);
export type SessionStart = z.infer<typeof SessionStartSchema>;
