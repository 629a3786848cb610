import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  getSchedulerState,
  isDue,
  isRunning,
  parseRunAt,
  resetSchedulerState,
  runExclusive,
  seoulClock,
  startScheduler,
  stopScheduler,
} from "../scheduler.js";

// 09:30 UTC is 18:30 in Seoul; 2024-05-10 is a Friday
const FRIDAY_EVENING = new Date("2024-05-10T09:30:00Z");

beforeEach(() => {
  resetSchedulerState();
});

afterEach(() => {
  stopScheduler();
  vi.useRealTimers();
});

describe("seoulClock", () => {
  it("reads the wall clock in Asia/Seoul", () => {
    expect(seoulClock(FRIDAY_EVENING)).toEqual({ date: "2024-05-10", weekday: 5, minutes: 1110 });
  });

  it("rolls over to the Seoul date before UTC does", () => {
    expect(seoulClock(new Date("2024-05-10T15:30:00Z"))).toEqual({ date: "2024-05-11", weekday: 6, minutes: 30 });
  });
});

describe("parseRunAt", () => {
  it("converts HH:MM to minutes", () => {
    expect(parseRunAt("18:00")).toBe(1080);
    expect(parseRunAt("7:05")).toBe(425);
  });

  it("rejects anything else", () => {
    expect(() => parseRunAt("6pm")).toThrow('Invalid schedule time "6pm" (expected HH:MM)');
  });
});

describe("isDue", () => {
  it("fires on a weekday at or after the run time", () => {
    expect(isDue(FRIDAY_EVENING, "18:00", "")).toBe(true);
    expect(isDue(FRIDAY_EVENING, "18:30", "")).toBe(true);
    expect(isDue(FRIDAY_EVENING, "18:31", "")).toBe(false);
  });

  it("fires once per Seoul date", () => {
    expect(isDue(FRIDAY_EVENING, "18:00", "2024-05-10")).toBe(false);
  });

  it("never fires on weekends", () => {
    expect(isDue(new Date("2024-05-11T09:30:00Z"), "18:00", "")).toBe(false);
    expect(isDue(new Date("2024-05-12T09:30:00Z"), "18:00", "")).toBe(false);
  });
});

describe("runExclusive", () => {
  it("refuses to overlap runs", async () => {
    let release: () => void = () => {};
    const first = runExclusive(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve("first");
        }),
    );
    expect(isRunning()).toBe(true);
    expect(await runExclusive(async () => "second")).toBeNull();

    release();
    expect(await first).toBe("first");
    expect(isRunning()).toBe(false);
  });

  it("records the last error and rethrows", async () => {
    await expect(runExclusive(async () => Promise.reject(new Error("disk full")))).rejects.toThrow("disk full");
    expect(getSchedulerState().lastError).toBe("disk full");
    expect(isRunning()).toBe(false);
  });
});

describe("startScheduler", () => {
  it("runs the job once when the time comes", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(FRIDAY_EVENING);
    const job = vi.fn(async () => "done");

    startScheduler(job, "18:00", 1000);
    expect(getSchedulerState().armed).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(job).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3000);
    expect(job).toHaveBeenCalledTimes(1);
    expect(getSchedulerState().lastRunDate).toBe("2024-05-10");
  });

  it("retries the daily run when another run was active at the scheduled time", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(FRIDAY_EVENING);
    let release: () => void = () => {};
    const manual = runExclusive(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve("manual");
        }),
    );
    const job = vi.fn(async () => "done");

    startScheduler(job, "18:00", 1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(job).not.toHaveBeenCalled();
    expect(getSchedulerState().lastRunDate).toBeNull();

    release();
    expect(await manual).toBe("manual");

    await vi.advanceTimersByTimeAsync(1000);
    expect(job).toHaveBeenCalledTimes(1);
    expect(getSchedulerState().lastRunDate).toBe("2024-05-10");
  });

  it("waits for the configured minute", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-10T08:58:30Z"));
    const job = vi.fn(async () => "done");

    startScheduler(job, "18:00", 30_000);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(job).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it("refuses an invalid run time", () => {
    expect(() => startScheduler(async () => null, "25h", 1000)).toThrow();
    expect(getSchedulerState().armed).toBe(false);
  });

  it("disarms on stop", () => {
    startScheduler(async () => null, "18:00", 1000);
    stopScheduler();
    expect(getSchedulerState().armed).toBe(false);
  });
});
