export type Transition<S> = {
  next: S
  probability: number
}

/**
 * Transition lists keyed by state, e.g. a `Map` or `Object.entries(record)`.
 */
export type TransitionTable<S> = Iterable<readonly [S, readonly Transition<S>[]]>

/**
 * A validated, immutable chain. Every state has a transition list summing to
 * 1 and every target is a member of `states`.
 *
 * States are matched like `Map` keys (SameValueZero). Object or array states
 * must be the same references everywhere; a structurally equal copy is an
 * unknown state.
 */
export interface MarkovChain<S> {
  readonly states: readonly S[]
  readonly transitions: ReadonlyMap<S, readonly Transition<S>[]>
  readonly initial: S
}
