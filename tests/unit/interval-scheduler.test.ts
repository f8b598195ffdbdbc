import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createIntervalScheduler } from "../../src/infrastructure/scheduler/interval-scheduler.js";
import { createRecordingLogger } from "../support/recording-logger.js";

describe("IntervalScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the task once per interval while started", async () => {
    const task = vi.fn(async () => {});
    const scheduler = createIntervalScheduler({
      name: "monitor",
      intervalMs: 60_000,
      task,
      logger: createRecordingLogger(),
    });

    scheduler.start();
    expect(scheduler.running).toBe(true);
    expect(task).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(180_000);
    expect(task).toHaveBeenCalledTimes(3);

    await scheduler.stop();
    expect(scheduler.running).toBe(false);
    await vi.advanceTimersByTimeAsync(120_000);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it("fires immediately with runOnStart", async () => {
    const task = vi.fn(async () => {});
    const scheduler = createIntervalScheduler({
      name: "monitor",
      intervalMs: 60_000,
      task,
      logger: createRecordingLogger(),
      runOnStart: true,
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(task).toHaveBeenCalledTimes(1);
    await scheduler.stop();
  });

  it("skips a tick while the previous run is still going", async () => {
    let release = (): void => {};
    const task = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );
    const logger = createRecordingLogger();
    const scheduler = createIntervalScheduler({ name: "monitor", intervalMs: 1_000, task, logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(2_000);

    expect(task).toHaveBeenCalledTimes(1);
    expect(logger.messages("warn")).toEqual(["Previous run still in progress, skipping tick"]);

    release();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(task).toHaveBeenCalledTimes(2);
    await scheduler.stop();
  });

  it("stop waits for the run in flight", async () => {
    let release = (): void => {};
    const events: string[] = [];
    const task = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = () => {
            events.push("run settled");
            resolve();
          };
        }),
    );
    const scheduler = createIntervalScheduler({
      name: "monitor",
      intervalMs: 1_000,
      task,
      logger: createRecordingLogger(),
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(task).toHaveBeenCalledTimes(1);

    const stopped = scheduler.stop().then(() => events.push("stopped"));
    expect(scheduler.running).toBe(false);
    await vi.advanceTimersByTimeAsync(0);
    expect(events).toEqual([]);

    release();
    await stopped;
    expect(events).toEqual(["run settled", "stopped"]);
  });

  it("logs a failing run and keeps the schedule", async () => {
    const task = vi.fn(async () => {
      throw new Error("query timeout");
    });
    const logger = createRecordingLogger();
    const scheduler = createIntervalScheduler({ name: "monitor", intervalMs: 1_000, task, logger });

    expect(await scheduler.runNow()).toBe(true);
    const failure = logger.records.find((r) => r.level === "error");
    expect(failure?.msg).toBe("Scheduled run failed");
    expect(failure?.meta["error"]).toBe("query timeout");

    scheduler.start();
    await vi.advanceTimersByTimeAsync(2_000);
    expect(task).toHaveBeenCalledTimes(3);
    await scheduler.stop();
  });
});
