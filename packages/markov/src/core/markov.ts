import { BetError, requireCount } from "@betlang/errors"
import { current } from "@betlang/random"
import type { MarkovChain, Transition, TransitionTable } from "../ports/markov-chain"

export const PROBABILITY_TOLERANCE = 1e-9

export function makeMarkovChain<S>(
  states: readonly S[],
  table: TransitionTable<S>,
  initial: S,
): MarkovChain<S> {
  const operation = "makeMarkovChain"
  const members = new Set(states)
  const transitions = new Map<S, readonly Transition<S>[]>()

  if (!members.has(initial)) {
    throw BetError.invalidArgument(operation, "initial state is not in the state set", {
      initial,
    })
  }

  for (const [state, list] of table) {
    if (!members.has(state)) {
      throw BetError.invalidArgument(operation, "transition table names an unknown state", {
        state,
      })
    }

    let total = 0
    for (const { next, probability } of list) {
      if (!members.has(next)) {
        throw BetError.invalidArgument(operation, "transition targets an unknown state", {
          state,
          next,
        })
      }
      if (!Number.isFinite(probability) || probability < 0) {
        throw BetError.invalidArgument(operation, "probabilities must be finite and non-negative", {
          state,
          probability,
        })
      }
      total += probability
    }

    if (Math.abs(total - 1) > PROBABILITY_TOLERANCE) {
      throw BetError.invalidArgument(operation, "transition probabilities must sum to 1", {
        state,
        total,
      })
    }

    transitions.set(
      state,
      Object.freeze(list.map(({ next, probability }) => Object.freeze({ next, probability }))),
    )
  }

  for (const state of members) {
    if (!transitions.has(state)) {
      throw BetError.invalidArgument(operation, "state has no transitions", { state })
    }
  }

  return Object.freeze({ states: Object.freeze([...members]), transitions, initial })
}

/**
 * One transition, one draw. The next state is found by cumulative bucketing
 * over the current state's list in its given order.
 */
export function markovStep<S>(chain: MarkovChain<S>, state: S): S {
  const list = chain.transitions.get(state)
  if (list === undefined) {
    throw BetError.invalidArgument("markovStep", "state is not in the chain", { state })
  }

  const u = current().next()
  let cumulative = 0
  let chosen: S = state

  // Rounding can leave the sum just under 1; the last reachable target wins.
  for (const { next, probability } of list) {
    if (probability === 0) continue
    chosen = next
    cumulative += probability
    if (u < cumulative) break
  }

  return chosen
}

/**
 * `steps + 1` states beginning with the chain's initial state.
 */
export function markovSimulate<S>(chain: MarkovChain<S>, steps: number): S[] {
  requireCount("markovSimulate", "steps", steps)

  const path = [chain.initial]
  let state = chain.initial
  for (let i = 0; i < steps; i++) {
    state = markovStep(chain, state)
    path.push(state)
  }

  return path
}

/**
 * Probability of moving from `from` to `to` in one step, summed over repeated
 * entries.
 */
export function transitionProbability<S>(chain: MarkovChain<S>, from: S, to: S): number {
  const list = chain.transitions.get(from)
  if (list === undefined) {
    throw BetError.invalidArgument("transitionProbability", "state is not in the chain", {
      state: from,
    })
  }

  return list.reduce((sum, { next, probability }) => (next === to ? sum + probability : sum), 0)
}
