export type LogContext = {
  /** Package emitting the entry, e.g. "random" or "bet" */
  module: string

  /** Operation name, e.g. "withSeed" or "betUntil" */
  operation: string

  /** Seed of the scope the entry belongs to */
  seed: number

  /** Number of seeded frames on the context stack */
  depth: number

  service: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Partial overlay applied to an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
