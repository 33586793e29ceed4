const LANCZOS_G = 5.2421875
const LANCZOS_COEFFICIENTS = [
  57.1562356658629235, -59.5979603554754912, 14.1360979747417471, -0.491913816097620199,
  0.339946499848118887e-4, 0.465236289270485756e-4, -0.983744753048795646e-4,
  0.158088703224912494e-3, -0.210264441724104883e-3, 0.217439618115212643e-3,
  -0.164391624891566008e-3, 0.844182239838527433e-4, -0.261908384015814087e-4,
  0.368991826595316234e-5,
] as const

const EPSILON = 1e-15
const TINY = 1e-300
const MAX_TERMS = 100_000_000
const NEWTON_STEPS = 12

/**
 * ln Γ(x) for x > 0 (Lanczos).
 */
export function logGamma(x: number): number {
  let denominator = x
  let series = 0.999999999999997092
  for (const coefficient of LANCZOS_COEFFICIENTS) {
    denominator++
    series += coefficient / denominator
  }

  const t = x + LANCZOS_G

  return (x + 0.5) * Math.log(t) - t + Math.log((2.5066282746310005 * series) / x)
}

function logPrefactor(a: number, x: number): number {
  return -x + a * Math.log(x) - logGamma(a)
}

function lowerSeries(a: number, x: number): number {
  let term = 1 / a
  let sum = term
  for (let n = 1; n < MAX_TERMS; n++) {
    term *= x / (a + n)
    sum += term
    if (Math.abs(term) < Math.abs(sum) * EPSILON) break
  }

  return sum * Math.exp(logPrefactor(a, x))
}

// Lentz's method for the continued fraction of Q(a, x).
function upperFraction(a: number, x: number): number {
  let b = x + 1 - a
  let c = 1 / TINY
  let d = 1 / b
  let h = d
  for (let i = 1; i < MAX_TERMS; i++) {
    const an = -i * (i - a)
    b += 2
    d = an * d + b
    if (Math.abs(d) < TINY) d = TINY
    c = b + an / c
    if (Math.abs(c) < TINY) c = TINY
    d = 1 / d
    const delta = d * c
    h *= delta
    if (Math.abs(delta - 1) < EPSILON) break
  }

  return Math.exp(logPrefactor(a, x)) * h
}

/**
 * Regularized lower incomplete gamma P(a, x) for a > 0, x >= 0.
 */
export function regularizedGammaP(a: number, x: number): number {
  if (x <= 0) return 0
  if (x < a + 1) return lowerSeries(a, x)

  return 1 - upperFraction(a, x)
}

/**
 * The x with P(a, x) = p, for a > 0 and p in [0, 1). Halley steps from a
 * Wilson–Hilferty (a > 1) or power-law (a <= 1) starting point.
 */
export function inverseRegularizedGammaP(a: number, p: number): number {
  if (p <= 0) return 0

  const lnGammaA = logGamma(a)
  const a1 = a - 1
  const lnA1 = a > 1 ? Math.log(a1) : 0
  const scale = a > 1 ? Math.exp(a1 * (lnA1 - 1) - lnGammaA) : 0
  let x: number

  if (a > 1) {
    const pp = p < 0.5 ? p : 1 - p
    const t = Math.sqrt(-2 * Math.log(pp))
    let z = (2.30753 + t * 0.27061) / (1 + t * (0.99229 + t * 0.04481)) - t
    if (p < 0.5) z = -z
    x = Math.max(1e-3, a * (1 - 1 / (9 * a) - z / (3 * Math.sqrt(a))) ** 3)
  } else {
    const t = 1 - a * (0.253 + a * 0.12)
    x = p < t ? (p / t) ** (1 / a) : 1 - Math.log(1 - (p - t) / (1 - t))
  }

  for (let step = 0; step < NEWTON_STEPS; step++) {
    if (x <= 0) return 0

    const error = regularizedGammaP(a, x) - p
    const density =
      a > 1
        ? scale * Math.exp(-(x - a1) + a1 * (Math.log(x) - lnA1))
        : Math.exp(-x + a1 * Math.log(x) - lnGammaA)
    const u = error / density
    const delta = u / (1 - 0.5 * Math.min(1, u * (a1 / x - 1)))
    x -= delta
    if (x <= 0) x = 0.5 * (x + delta)
    if (Math.abs(delta) < 1e-8 * x) break
  }

  return x
}
