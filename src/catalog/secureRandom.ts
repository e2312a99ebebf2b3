/**
 * Secure random index selection
 *
 * Backed by crypto.randomInt, which draws from the OS CSPRNG and uses
 * rejection sampling, so there is no modulo bias. There is no fallback to
 * Math.random: if the source fails, the call fails.
 */

import { randomInt } from "crypto";
import type { RandomIndexSource } from "@/types/catalog";
import { RandomSourceError } from "./errors";

/** crypto.randomInt requires max - min < 2^48 */
const MAX_RANGE = 2 ** 48;

export const cryptoRandomIndex: RandomIndexSource = (max) => randomInt(max);

/**
 * Draw a uniformly distributed integer in [0, n).
 *
 * @param n - Number of candidates, a positive safe integer below 2^48
 * @param source - Entropy source (tests inject failing or fixed sources)
 * @throws {RangeError} If n is out of range
 * @throws {RandomSourceError} If the source throws or returns a value outside [0, n)
 */
export function secureRandomIndex(
  n: number,
  source: RandomIndexSource = cryptoRandomIndex,
): number {
  if (!Number.isSafeInteger(n) || n <= 0 || n >= MAX_RANGE) {
    throw new RangeError(`Candidate count must be a positive integer below 2^48, got ${n}`);
  }

  let index: number;
  try {
    index = source(n);
  } catch (err) {
    throw new RandomSourceError(err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  if (!Number.isInteger(index) || index < 0 || index >= n) {
    throw new RandomSourceError(`index ${index} outside [0, ${n})`);
  }

  return index;
}
