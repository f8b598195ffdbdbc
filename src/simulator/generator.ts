/**
 * Synthetic sensor values. Every generator takes an injectable random
 * source so tests can pin the output.
 */

export interface ReadingPayload {
  readonly temperature: number;
  readonly humidity: number;
  readonly fridgeNo: number;
}

export interface ValueRange {
  readonly min: number;
  readonly max: number;
}

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export const NORMAL_TEMPERATURE: ValueRange = { min: 2, max: 8 };
/** Deliberately above the default 8 °C alert threshold */
export const FAULTY_TEMPERATURE: ValueRange = { min: 8, max: 12 };
export const HUMIDITY: ValueRange = { min: 30, max: 55 };

const round2 = (n: number): number => Math.round(n * 100) / 100;

export const uniform = (range: ValueRange, random: RandomSource = Math.random): number =>
  round2(range.min + random() * (range.max - range.min));

export const generateReading = (fridgeNo: number, random: RandomSource = Math.random): ReadingPayload => ({
  temperature: uniform(NORMAL_TEMPERATURE, random),
  humidity: uniform(HUMIDITY, random),
  fridgeNo,
});

/** A reading from a fridge that is running warm */
export const generateFaultyReading = (
  fridgeNo: number,
  random: RandomSource = Math.random,
): ReadingPayload => ({
  temperature: uniform(FAULTY_TEMPERATURE, random),
  humidity: uniform(HUMIDITY, random),
  fridgeNo,
});
