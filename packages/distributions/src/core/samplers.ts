import { betCategorical } from "@betlang/bet"
import { BetError, requireCount, requireFinite, requireProbability } from "@betlang/errors"
import { current } from "@betlang/random"
import { inverseRegularizedGammaP, logGamma, regularizedGammaP } from "./gamma-function"

/**
 * Parametric samplers. Each one draws from the ambient context and consumes a
 * fixed number of draws:
 *
 * | sampler       | draws |
 * | ------------- | ----- |
 * | `normal`      | 2     |
 * | `logNormal`   | 2     |
 * | `binomial`    | n     |
 * | `poisson`     | 1     |
 * | `exponential` | 1     |
 * | `uniform`     | 1     |
 * | `bernoulli`   | 1     |
 * | `gamma`       | 1     |
 * | `beta`        | 2     |
 * | `chiSquared`  | 1     |
 * | `studentT`    | 3     |
 * | `cauchy`      | 1     |
 * | `weibull`     | 1     |
 * | `pareto`      | 1     |
 * | `triangular`  | 1     |
 * | `mixture`     | 1 + the chosen component's |
 */

/** Largest rate `poisson` accepts. */
export const MAX_POISSON_RATE = 1e12

function requireSigma(operation: string, sigma: number): void {
  requireFinite(operation, "sigma", sigma)
  if (sigma < 0) {
    throw BetError.invalidArgument(operation, "sigma must be >= 0", { sigma })
  }
}

function requirePositive(operation: string, name: string, value: number): void {
  requireFinite(operation, name, value)
  if (value <= 0) {
    throw BetError.invalidArgument(operation, `${name} must be > 0`, { [name]: value })
  }
}

function requireRate(operation: string, lambda: number): void {
  requirePositive(operation, "lambda", lambda)
}

/**
 * Box–Muller, cosine branch. `u1` is mapped to (0, 1] so the logarithm is
 * always finite.
 */
export function normal(mu: number, sigma: number): number {
  requireFinite("normal", "mu", mu)
  requireSigma("normal", sigma)

  const source = current()
  const u1 = 1 - source.next()
  const u2 = source.next()

  return mu + sigma * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
}

export function logNormal(mu: number, sigma: number): number {
  requireFinite("logNormal", "mu", mu)
  requireSigma("logNormal", sigma)

  return Math.exp(normal(mu, sigma))
}

/**
 * Number of successes in `n` Bernoulli trials.
 */
export function binomial(n: number, p: number): number {
  requireCount("binomial", "n", n)
  requireProbability("binomial", "p", p)

  const source = current()
  let successes = 0
  for (let i = 0; i < n; i++) {
    if (source.next() < p) successes++
  }

  return successes
}

/**
 * Inverse CDF over one uniform draw: the smallest k with F(k) > u. The search
 * starts at the mode, where F is computed through the incomplete gamma
 * function, and walks down or up one term at a time.
 */
export function poisson(lambda: number): number {
  requireRate("poisson", lambda)
  if (lambda > MAX_POISSON_RATE) {
    throw BetError.invalidArgument("poisson", `lambda must be <= ${MAX_POISSON_RATE}`, { lambda })
  }

  const u = current().next()
  let k = Math.floor(lambda)
  let term = Math.exp(-lambda + k * Math.log(lambda) - logGamma(k + 1))
  let cumulative = 1 - regularizedGammaP(k + 1, lambda)

  if (u < cumulative) {
    while (k > 0 && u < cumulative - term) {
      cumulative -= term
      term *= k / lambda
      k--
    }

    return k
  }

  while (u >= cumulative) {
    k++
    term *= lambda / k
    if (term === 0) break
    cumulative += term
  }

  return k
}

export function exponential(lambda: number): number {
  requireRate("exponential", lambda)

  return -Math.log(1 - current().next()) / lambda
}

export function uniform(lo: number, hi: number): number {
  requireFinite("uniform", "lo", lo)
  requireFinite("uniform", "hi", hi)
  if (lo > hi) throw BetError.invalidArgument("uniform", "lo must be <= hi", { lo, hi })

  return lo + current().next() * (hi - lo)
}

export function bernoulli(p: number): boolean {
  requireProbability("bernoulli", "p", p)

  return current().next() < p
}

/**
 * Gamma with the given shape and scale, by inverting the regularized
 * incomplete gamma function at one uniform draw.
 */
export function gamma(shape: number, scale: number): number {
  requirePositive("gamma", "shape", shape)
  requirePositive("gamma", "scale", scale)

  return scale * inverseRegularizedGammaP(shape, current().next())
}

/**
 * `X / (X + Y)` for X ~ Gamma(alpha, 1), Y ~ Gamma(betaShape, 1).
 */
export function beta(alpha: number, betaShape: number): number {
  requirePositive("beta", "alpha", alpha)
  requirePositive("beta", "beta", betaShape)

  const x = gamma(alpha, 1)
  const y = gamma(betaShape, 1)
  if (x === 0) return 0

  return x / (x + y)
}

export function chiSquared(df: number): number {
  requirePositive("chiSquared", "df", df)

  return gamma(df / 2, 2)
}

/**
 * `Z / sqrt(V / df)` for Z ~ N(0, 1), V ~ χ²(df).
 */
export function studentT(df: number): number {
  requirePositive("studentT", "df", df)

  const z = normal(0, 1)
  const v = chiSquared(df)

  return z / Math.sqrt(v / df)
}

export function cauchy(location: number, scale: number): number {
  requireFinite("cauchy", "location", location)
  requirePositive("cauchy", "scale", scale)

  return location + scale * Math.tan(Math.PI * (current().next() - 0.5))
}

export function weibull(scale: number, shape: number): number {
  requirePositive("weibull", "scale", scale)
  requirePositive("weibull", "shape", shape)

  return scale * (-Math.log(1 - current().next())) ** (1 / shape)
}

/**
 * Values in [scale, ∞) with tail index `shape`.
 */
export function pareto(scale: number, shape: number): number {
  requirePositive("pareto", "scale", scale)
  requirePositive("pareto", "shape", shape)

  return scale * (1 - current().next()) ** (-1 / shape)
}

export function triangular(min: number, max: number, mode: number): number {
  requireFinite("triangular", "min", min)
  requireFinite("triangular", "max", max)
  requireFinite("triangular", "mode", mode)
  if (!(min <= mode && mode <= max)) {
    throw BetError.invalidArgument("triangular", "min <= mode <= max is required", {
      min,
      max,
      mode,
    })
  }

  const u = current().next()
  const span = max - min
  if (span === 0) return min

  return u < (mode - min) / span
    ? min + Math.sqrt(u * span * (mode - min))
    : max - Math.sqrt((1 - u) * span * (max - mode))
}

/**
 * One weighted draw picks a component, which is then sampled.
 */
export function mixture<T>(
  first: () => T,
  firstWeight: number,
  second: () => T,
  secondWeight: number,
): T {
  const component = betCategorical([
    { value: first, weight: firstWeight },
    { value: second, weight: secondWeight },
  ])

  return component()
}
