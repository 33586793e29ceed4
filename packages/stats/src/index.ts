export { canonicalKey } from "./core/canonical-key"
export { histogram, renderHistogram, sparkline } from "./core/charts"
export {
  correlation,
  covariance,
  maximum,
  mean,
  median,
  minimum,
  movingAverage,
  percentile,
  range,
  stddev,
  summarize,
  variance,
} from "./core/descriptive"
export { entropy, frequencyTable, mode } from "./core/frequency"
export { bootstrap, chiSquareTest } from "./core/inference"
export type { FrequencyEntry, FrequencyTable, Histogram, Summary } from "./ports/stats"
