import { randomInt } from "node:crypto"

/**
 * A uniformly random unsigned 32-bit seed from the operating system's CSPRNG.
 */
export function createEntropySeed(): number {
  return randomInt(0, 2 ** 32)
}
