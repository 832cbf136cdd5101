import { InvalidArgumentError } from "commander";
import type { HttpProfile } from "../http/client";

/**
 * Parses a positional worker-count argument. Missing, non-numeric and
 * non-positive values fall back to `fallback`.
 */
export function parseWorkerCount(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return fallback;
  const parsed = Number.parseInt(trimmed, 10);
  return parsed > 0 ? parsed : fallback;
}

export const HTTP_PROFILES: ReadonlyArray<HttpProfile> = ["browser", "minimal"];

function isHttpProfile(value: string): value is HttpProfile {
  return HTTP_PROFILES.some((profile) => profile === value);
}

export function parseProfile(value: string): HttpProfile {
  if (!isHttpProfile(value)) {
    throw new InvalidArgumentError(`expected one of: ${HTTP_PROFILES.join(", ")}`);
  }
  return value;
}

/**
 * Parses an episode cap. Zero and negative values mean no cap.
 */
export function parseLimit(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("expected an integer");
  }
  return Number.parseInt(trimmed, 10);
}
