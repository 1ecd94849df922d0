import { randomBytes } from "node:crypto";
import { UINT32_MAX } from "./schemas.js";

export type Rng = () => number;

const LCG_MULTIPLIER = 1664525;
const LCG_INCREMENT = 1013904223;
const TWO_POW_32 = 4294967296;

/**
 * 32-bit linear congruential generator. Each draw advances the state once and returns `state / 2^32`,
 * so any implementation using the same constants reproduces the same sequence for a seed.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(LCG_MULTIPLIER, state) + LCG_INCREMENT) >>> 0;
    return state / TWO_POW_32;
  };
}

export function pick<T>(rng: Rng, items: readonly [T, ...T[]]): T {
  const idx = Math.floor(rng() * items.length);
  return items[idx] ?? items[0];
}

/** Fisher-Yates from the last index down; returns a new array. */
export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = out[i];
    const swap = out[j];
    if (tmp === undefined || swap === undefined) continue;
    out[i] = swap;
    out[j] = tmp;
  }
  return out;
}

export function drawSeed(): number {
  return randomBytes(4).readUInt32BE(0);
}

export function isSeed(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}
