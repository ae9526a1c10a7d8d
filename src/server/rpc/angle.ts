// src/server/rpc/angle.ts

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses an angle such as "90d", "1.57r" or "1.57" into radians.
 *
 * A `d`/`D` suffix means degrees, `r`/`R` or no suffix means radians.
 *
 * @throws {Error} With a message suitable for an RPC error's `data`.
 */
export function parseAngle(input: string): number {
  const s = input.trim();
  if (s.length === 0) {
    throw new Error("Empty angle string");
  }

  const last = s[s.length - 1];
  if (last === "d" || last === "D") {
    return (parseNumber(s.slice(0, -1)) * Math.PI) / 180;
  }
  if (last === "r" || last === "R") {
    return parseNumber(s.slice(0, -1));
  }
  if (NUMBER_PATTERN.test(s)) {
    return parseNumber(s);
  }
  throw new Error(
    `Invalid angle format '${s}'. Use '90d' for degrees or '1.57r' for radians`,
  );
}

function parseNumber(num: string): number {
  if (!NUMBER_PATTERN.test(num)) {
    throw new Error(`Invalid number in angle: ${num}`);
  }
  const value = Number(num);
  if (!Number.isFinite(value)) {
    throw new Error(`Angle out of range: ${num}`);
  }
  return value;
}
