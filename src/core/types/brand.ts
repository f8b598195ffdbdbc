/**
 * Branded / Opaque type utility.
 * Prevents accidental interchange of structurally identical primitives.
 *
 * @example
 * type ReadingId = Brand<number, "ReadingId">;
 * const id: ReadingId = brand<number, "ReadingId">(1);
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Common branded identifiers */
export type ReadingId = Brand<number, "ReadingId">;
export type FridgeNo = Brand<number, "FridgeNo">;
export type RequestId = Brand<string, "RequestId">;

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;
