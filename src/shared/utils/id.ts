import { randomUUID } from "node:crypto";

/**
 * Generate a cryptographically random request identifier (UUIDv4).
 */
export const generateId = (): string => randomUUID();
