import { LedgerError } from "./errors.js";

export type RoundingMode = "down" | "up";

export function mulDiv(
  a: bigint,
  b: bigint,
  denom: bigint,
  rounding: RoundingMode = "down"
): bigint {
  if (denom === 0n) throw new LedgerError("DivisionByZero", "Division by zero");
  const product = a * b;
  if (rounding === "down") return product / denom;
  const q = product / denom;
  const r = product % denom;
  return r === 0n ? q : q + 1n;
}

export function absBigInt(x: bigint): bigint {
  return x < 0n ? -x : x;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
