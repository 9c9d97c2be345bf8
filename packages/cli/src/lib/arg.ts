/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to keep output bounded
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse an entry reference: "#12" is an entry id, anything else a headword
 */
export function parseEntryRef(value: string): number | string {
  const trimmed = value.trim();

  if (trimmed.startsWith("#")) {
    const digits = trimmed.slice(1);
    if (!/^\d+$/.test(digits)) {
      throw new InvalidArgumentError(`Invalid entry id "${trimmed}"; expected #<number>`);
    }
    return Number.parseInt(digits, 10);
  }

  if (!trimmed) {
    throw new InvalidArgumentError("Entry headword must not be empty");
  }
  return trimmed;
}
