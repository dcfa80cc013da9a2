import type { TrackDiscPair } from "./types.ts";

const EMPTY: TrackDiscPair = { number: null, total: null };

/** Integer coercion: finite numbers truncate, strings must be plain signed digits */
export function toInteger(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
  }
  return null;
}

function fromPair(first: unknown, second: unknown): TrackDiscPair {
  const number = toInteger(first);
  if (number === null) return { ...EMPTY };
  if (!second) return { number, total: null };

  const total = toInteger(second);
  return total === null ? { ...EMPTY } : { number, total };
}

// Parts after the second slash are ignored: "3/12/7" => 3 of 12
function fromSlashed(value: string): TrackDiscPair {
  const [left = "", right = ""] = value.split("/");
  const number = toInteger(left);
  if (number === null) return { ...EMPTY };

  if (right.trim() === "") return { number, total: null };

  const total = toInteger(right);
  return total === null ? { ...EMPTY } : { number, total };
}

/**
 * Parses track/disc notation into a number and an optional total.
 *
 * Accepts `[3, 12]`, `"3/12"`, `"3"` or `3`. Anything unparseable collapses to
 * `{ number: null, total: null }`; never throws.
 *
 * @example
 * normalizeTrackDisc("3/12") => { number: 3, total: 12 }
 * normalizeTrackDisc("5/") => { number: 5, total: null }
 * normalizeTrackDisc([7, 0]) => { number: 7, total: null }
 */
export function normalizeTrackDisc(raw: unknown): TrackDiscPair {
  if (raw === null || raw === undefined) return { ...EMPTY };

  if (Array.isArray(raw) && raw.length >= 2) {
    return fromPair(raw[0], raw[1]);
  }

  if (typeof raw === "string" && raw.includes("/")) {
    return fromSlashed(raw);
  }

  const number = toInteger(raw);
  return { number, total: null };
}
