import { describe, expect, it } from "vitest";
import {
  type Thresholds,
  buildAlertMessage,
  formatAlertLine,
  violatesThresholds,
} from "../../src/application/services/threshold-policy.js";
import type { FridgeReading } from "../../src/core/entities/reading.entity.js";
import { brand } from "../../src/core/types/brand.js";

const reading = (id: number, temperature: number, humidity: number, fridgeNo = 1): FridgeReading => ({
  id: brand<number, "ReadingId">(id),
  temperature,
  humidity,
  timestamp: new Date("2024-05-01T10:00:00.000Z"),
  fridgeNo: brand<number, "FridgeNo">(fridgeNo),
});

const defaults: Thresholds = { maxTemperature: 8, maxHumidity: 60 };

describe("violatesThresholds", () => {
  it("flags readings strictly above either maximum", () => {
    expect(violatesThresholds(reading(1, 8.01, 40), defaults)).toBe(true);
    expect(violatesThresholds(reading(2, 4, 60.5), defaults)).toBe(true);
  });

  it("treats values equal to the maximum as acceptable", () => {
    expect(violatesThresholds(reading(1, 8, 60), defaults)).toBe(false);
  });

  it("ignores low values unless minimums are configured", () => {
    expect(violatesThresholds(reading(1, -5, 5), defaults)).toBe(false);

    const bounded: Thresholds = { ...defaults, minTemperature: 1, minHumidity: 20 };
    expect(violatesThresholds(reading(1, 0.5, 40), bounded)).toBe(true);
    expect(violatesThresholds(reading(2, 4, 19), bounded)).toBe(true);
    expect(violatesThresholds(reading(3, 1, 20), bounded)).toBe(false);
  });
});

describe("alert message", () => {
  it("formats one line per reading", () => {
    expect(formatAlertLine(reading(1, 9.5, 41.2, 4))).toBe(
      "Alert! Fridge with number 4 Temperature: 9.5, Humidity: 41.2 at 2024-05-01T10:00:00.000Z",
    );
  });

  it("joins lines with newlines in the given order", () => {
    const message = buildAlertMessage([reading(1, 9, 40, 4), reading(2, 5, 65, 2)]);
    expect(message.split("\n")).toEqual([
      "Alert! Fridge with number 4 Temperature: 9, Humidity: 40 at 2024-05-01T10:00:00.000Z",
      "Alert! Fridge with number 2 Temperature: 5, Humidity: 65 at 2024-05-01T10:00:00.000Z",
    ]);
  });
});
