export { inverseRegularizedGammaP, logGamma, regularizedGammaP } from "./core/gamma-function"
export {
  bernoulli,
  beta,
  binomial,
  cauchy,
  chiSquared,
  exponential,
  gamma,
  logNormal,
  MAX_POISSON_RATE,
  mixture,
  normal,
  pareto,
  poisson,
  studentT,
  triangular,
  uniform,
  weibull,
} from "./core/samplers"
export {
  randomWalk,
  sampleWithoutReplacement,
  sampleWithReplacement,
  shuffle,
} from "./core/sequences"
