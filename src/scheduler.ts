import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "./errors.js";
import { formatTimestamp, logger } from "./logger.js";

export type ScheduleConfig =
  | { type: "interval"; hours: number }
  | { type: "daily"; hour: number; minute: number };

// Longest delay a Node timer takes; longer ones fire after 1ms.
export const MAX_TIMER_MS = 2 ** 31 - 1;

type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

/**
 * Next run after `now`. Interval schedules count from `now`; daily schedules
 * land on the next matching wall-clock time in `timeZone` (UTC by default).
 */
export function nextRunAt(now: Date, schedule: ScheduleConfig, timeZone?: string): Date {
  if (schedule.type === "interval") {
    return new Date(now.getTime() + schedule.hours * 60 * 60 * 1000);
  }

  const parts = getZonedParts(now, timeZone);
  const nowMinutes = parts.hour * 60 + parts.minute + parts.second / 60;
  const targetMinutes = schedule.hour * 60 + schedule.minute;
  const dayOffset = nowMinutes < targetMinutes ? 0 : 1;
  return zonedToUtc(
    {
      year: parts.year,
      month: parts.month,
      day: parts.day + dayOffset,
      hour: schedule.hour,
      minute: schedule.minute,
      second: 0
    },
    timeZone
  );
}

/** Runs `task` on `schedule` until the process is stopped or `isFatal` accepts a task error. */
export async function runForever(args: {
  schedule: ScheduleConfig;
  timeZone?: string;
  task: () => Promise<unknown>;
  isFatal?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
  maxRuns?: number;
}) {
  const sleep = args.sleep ?? delay;
  const now = args.now ?? (() => new Date());
  let runs = 0;

  for (;;) {
    try {
      await args.task();
    } catch (error) {
      if (args.isFatal?.(error)) throw error;
      logger.error("schedule.task.failed", { error: describeError(error) });
    }
    runs += 1;
    if (args.maxRuns !== undefined && runs >= args.maxRuns) return;

    const current = now();
    const next = nextRunAt(current, args.schedule, args.timeZone);
    const waitMs = Math.max(0, next.getTime() - current.getTime());
    logger.info("schedule.next", {
      nextRunAt: formatTimestamp(next, args.timeZone),
      sleepHours: Number((waitMs / 3_600_000).toFixed(1))
    });
    let remaining = waitMs;
    do {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      await sleep(chunk);
      remaining -= chunk;
    } while (remaining > 0);
  }
}

function getZonedParts(date: Date, timeZone?: string): ZonedParts {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timeZone ?? "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  });
  const map = Object.fromEntries(
    formatter.formatToParts(date).map((part) => [part.type, part.value])
  );
  return {
    year: Number(map.year),
    month: Number(map.month),
    day: Number(map.day),
    hour: Number(map.hour),
    minute: Number(map.minute),
    second: Number(map.second)
  };
}

// Wall-clock time in a zone to an instant: guess as if UTC, then correct by the
// zone's offset at that guess (twice, to settle across DST transitions).
function zonedToUtc(parts: ZonedParts, timeZone?: string) {
  const target = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  let guess = target;
  for (let i = 0; i < 2; i += 1) {
    const seen = getZonedParts(new Date(guess), timeZone);
    const seenAsUtc = Date.UTC(seen.year, seen.month - 1, seen.day, seen.hour, seen.minute, seen.second);
    guess += target - seenAsUtc;
  }
  return new Date(guess);
}
