import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import timezone from "dayjs/plugin/timezone";

dayjs.extend(utc);
dayjs.extend(timezone);

export function parseTimestamp(raw: unknown): number | null {
  if (typeof raw !== "string" || raw.length === 0) return null;
  const parsed = dayjs(raw);
  return parsed.isValid() ? parsed.valueOf() : null;
}

export function formatClock(timestampMs: number | null, zone: string): string {
  if (timestampMs === null) return "--:--";
  return dayjs(timestampMs).tz(zone).format("HH:mm");
}
