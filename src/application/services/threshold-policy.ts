import type { FridgeReading } from "../../core/entities/reading.entity.js";

/**
 * Acceptable range for a reading. Upper bounds always apply;
 * lower bounds only when configured.
 */
export interface Thresholds {
  readonly maxTemperature: number;
  readonly maxHumidity: number;
  readonly minTemperature?: number | undefined;
  readonly minHumidity?: number | undefined;
}

export const violatesThresholds = (reading: FridgeReading, t: Thresholds): boolean =>
  reading.temperature > t.maxTemperature ||
  reading.humidity > t.maxHumidity ||
  (t.minTemperature !== undefined && reading.temperature < t.minTemperature) ||
  (t.minHumidity !== undefined && reading.humidity < t.minHumidity);

/**
 *   Alert! Fridge with number 4 Temperature: 9.5, Humidity: 41.2 at 2024-05-01T10:00:00.000Z
 */
export const formatAlertLine = (reading: FridgeReading): string =>
  `Alert! Fridge with number ${reading.fridgeNo} Temperature: ${reading.temperature}, Humidity: ${reading.humidity} at ${reading.timestamp.toISOString()}`;

/** One line per violating reading, in the order given */
export const buildAlertMessage = (violating: readonly FridgeReading[]): string =>
  violating.map(formatAlertLine).join("\n");
