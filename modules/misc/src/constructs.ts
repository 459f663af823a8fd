/**
 * Checks, at compile time, that all cases of a union were handled. Place it at the end of an if/else chain (or in the
 * `default` of a switch) over a union-typed value: adding a member to the union turns the call site into a compile
 * error.
 *
 *   function label(s: CrateStatus) {
 *     if (s === 'ok') return 'built'
 *     ...
 *     shouldNeverHappen(s)
 *   }
 */
export function shouldNeverHappen(n: never): never {
  // Never executed, but the compiler needs a terminal statement.
  throw new Error(`This should never happen ${n}`)
}

/**
 * An always-failing function, intended as the right-hand side of `??` / `||` when no fallback value exists:
 *
 *    const home = process.env['HOME'] || failMe('missing env variable "HOME"')
 */
export function failMe(hint?: string): never {
  if (!hint) {
    throw new Error(`This expression must never be evaluated`)
  }

  throw new Error(`Bad value: ${hint}`)
}

/**
 * Evaluates exactly one of `cases`, selected by `selector`. Fails to compile if `cases` does not cover every member of
 * the selector's union (or covers a non-member).
 */
export function switchOn<G, K extends string>(selector: K, cases: Record<K, () => G>): G {
  const f = cases[selector]
  return f()
}

/**
 * Converts an `unknown` (typically the argument of a `catch` clause) into an Error-like object whose `message` and
 * `stack` are strings when the input carries string properties of that name.
 */
export function errorLike(err: unknown): { message: string | undefined; stack: string | undefined } {
  if (typeof err !== 'object' || err === null) {
    return { message: typeof err === 'string' ? err : undefined, stack: undefined }
  }
  const message = 'message' in err ? err.message : undefined
  const stack = 'stack' in err ? err.stack : undefined
  return {
    message: typeof message === 'string' ? message : undefined,
    stack: typeof stack === 'string' ? stack : undefined,
  }
}

/**
 * A one-line description of a thrown value, for log lines and persisted error fields.
 */
export function describeError(err: unknown): string {
  return errorLike(err).message ?? String(err)
}
