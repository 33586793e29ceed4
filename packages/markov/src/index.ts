export {
  makeMarkovChain,
  markovSimulate,
  markovStep,
  PROBABILITY_TOLERANCE,
  transitionProbability,
} from "./core/markov"
export type { MarkovChain, Transition, TransitionTable } from "./ports/markov-chain"
