import { logger, pruneOldLogs } from "./logging.js";
import { errorMessage } from "./shared/errors.js";

const log = logger.child({ subsystem: "scheduler" });

// 30s poll: must not miss the configured minute
const CHECK_MS = 30_000;

let checkTimer: ReturnType<typeof setInterval> | null = null;
let running = false;
let lastRunDate = "";
let lastRunAt: string | null = null;
let lastError: string | null = null;
let runAt = "18:00";

export interface SeoulClock {
  /** YYYY-MM-DD */
  date: string;
  /** 0 = Sunday … 6 = Saturday */
  weekday: number;
  /** Minutes since midnight */
  minutes: number;
}

const seoulParts = new Intl.DateTimeFormat("en-US", {
  timeZone: "Asia/Seoul",
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  hour: "2-digit",
  minute: "2-digit",
  weekday: "short",
  hourCycle: "h23",
});

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

export function seoulClock(now: Date): SeoulClock {
  const parts = new Map(seoulParts.formatToParts(now).map((p) => [p.type, p.value]));
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.get(type) ?? "";
  return {
    date: `${part("year")}-${part("month")}-${part("day")}`,
    weekday: WEEKDAYS.indexOf(part("weekday")),
    minutes: Number(part("hour")) * 60 + Number(part("minute")),
  };
}

export function parseRunAt(hhmm: string): number {
  const m = /^(\d{1,2}):(\d{2})$/.exec(hhmm);
  if (!m) throw new Error(`Invalid schedule time "${hhmm}" (expected HH:MM)`);
  return Number(m[1]) * 60 + Number(m[2]);
}

/** Weekday, at or past the run time, and not yet run on this Seoul date. */
export function isDue(now: Date, runAtHHMM: string, lastDate: string): boolean {
  const clock = seoulClock(now);
  if (clock.weekday === 0 || clock.weekday === 6) return false;
  if (clock.date === lastDate) return false;
  return clock.minutes >= parseRunAt(runAtHHMM);
}

/**
 * Run `job` unless another run is in progress. Resolves to null when the call
 * was refused because a run was already active.
 */
export async function runExclusive<T>(job: () => Promise<T>): Promise<T | null> {
  if (running) {
    log.warn("Pipeline already running; request ignored");
    return null;
  }
  running = true;
  try {
    const result = await job();
    lastError = null;
    return result;
  } catch (e) {
    lastError = errorMessage(e);
    throw e;
  } finally {
    running = false;
    lastRunAt = new Date().toISOString();
  }
}

export function isRunning(): boolean {
  return running;
}

async function checkSchedule(job: () => Promise<unknown>): Promise<void> {
  const now = new Date();
  if (!isDue(now, runAt, lastRunDate)) return;

  const date = seoulClock(now).date;
  // Marked only once the run actually starts; a refused attempt retries on the next check
  const result = await runExclusive(() => {
    lastRunDate = date;
    log.info({ date, runAt }, "Daily pipeline run triggered");
    return job();
  });
  if (result === null && lastRunDate !== date) {
    log.info({ date }, "Daily run deferred: another pipeline run is active");
    return;
  }
  pruneOldLogs();
}

/** Arm the daily weekday run at `runAtHHMM` Asia/Seoul. No-op if already armed. */
export function startScheduler(job: () => Promise<unknown>, runAtHHMM: string, checkMs: number = CHECK_MS): void {
  if (checkTimer) return;
  parseRunAt(runAtHHMM);
  runAt = runAtHHMM;
  checkTimer = setInterval(() => {
    checkSchedule(job).catch((err) => log.error({ err: errorMessage(err) }, "Scheduled pipeline run failed"));
  }, checkMs);
  log.info({ runAt, timezone: "Asia/Seoul" }, "Daily pipeline scheduler armed (weekdays)");
}

export function stopScheduler(): void {
  if (checkTimer) {
    clearInterval(checkTimer);
    checkTimer = null;
    log.info("Scheduler stopped");
  }
}

export function getSchedulerState() {
  return {
    armed: checkTimer !== null,
    running,
    runAt,
    lastRunDate: lastRunDate || null,
    lastRunAt,
    lastError,
  };
}

/** Test hook: forget the last run so the next due check fires again. */
export function resetSchedulerState(): void {
  lastRunDate = "";
  lastRunAt = null;
  lastError = null;
}
