import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ReadingPayload } from "../../src/simulator/generator.js";
import { DEFAULT_SIMULATION, type SimulationOptions, runSimulation } from "../../src/simulator/runner.js";
import type { SendReading } from "../../src/simulator/sender.js";
import { createRecordingLogger } from "../support/recording-logger.js";

const ENDPOINT = "http://localhost:7071/api/fridge-reading";

const recordingSender = (accept = true): { send: SendReading; payloads: ReadingPayload[] } => {
  const payloads: ReadingPayload[] = [];
  return {
    payloads,
    send: async (_url, reading) => {
      payloads.push(reading);
      return accept;
    },
  };
};

describe("runSimulation", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    vi.setSystemTime(new Date("2024-05-01T10:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sends on every interval until the runtime is spent", async () => {
    const { send, payloads } = recordingSender();
    const options: SimulationOptions = { ...DEFAULT_SIMULATION, url: ENDPOINT, fridgeCount: 2 };

    const run = runSimulation(options, { logger: createRecordingLogger(), send, random: () => 0.25 });
    await vi.advanceTimersByTimeAsync(60_000);
    const summary = await run;

    // 6 readings per healthy fridge (t = 0, 10 … 50 s) plus one from the faulty fridge at 30 s
    expect(summary).toEqual({ sent: 13, failed: 0 });
    expect(payloads.filter((p) => p.fridgeNo === 0)).toHaveLength(6);
    expect(payloads.filter((p) => p.fridgeNo === 1)).toHaveLength(6);
    expect(payloads.filter((p) => p.fridgeNo === 4)).toEqual([{ temperature: 9, humidity: 36.25, fridgeNo: 4 }]);
    expect(payloads[0]).toEqual({ temperature: 3.5, humidity: 36.25, fridgeNo: 0 });
  });

  it("counts rejected readings as failed", async () => {
    const { send } = recordingSender(false);
    const options: SimulationOptions = { ...DEFAULT_SIMULATION, url: ENDPOINT, runtimeMs: 20_000, faulty: null };

    const run = runSimulation(options, { logger: createRecordingLogger(), send });
    await vi.advanceTimersByTimeAsync(20_000);

    expect(await run).toEqual({ sent: 0, failed: 2 });
  });

  it("never starts the faulty fridge when the runtime ends first", async () => {
    const { send, payloads } = recordingSender();
    const options: SimulationOptions = { ...DEFAULT_SIMULATION, url: ENDPOINT, runtimeMs: 25_000 };

    const run = runSimulation(options, { logger: createRecordingLogger(), send });
    await vi.advanceTimersByTimeAsync(30_000);
    await run;

    expect(payloads.some((p) => p.fridgeNo === 4)).toBe(false);
  });

  it("stops early when the signal aborts", async () => {
    const { send } = recordingSender();
    const controller = new AbortController();
    const options: SimulationOptions = { ...DEFAULT_SIMULATION, url: ENDPOINT, signal: controller.signal };

    const run = runSimulation(options, { logger: createRecordingLogger(), send });
    await vi.advanceTimersByTimeAsync(15_000);
    controller.abort();

    expect(await run).toEqual({ sent: 2, failed: 0 });
  });
});
