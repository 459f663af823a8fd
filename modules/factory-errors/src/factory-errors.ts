export type FailureKind =
  /**
   * A registry or manifest request failed after all retries. Callers fall back to the local cache.
   */
  | 'transient-network'
  /**
   * The host build tools (cargo, rustc) are not on the PATH. Fatal: aborts the batch before any work.
   */
  | 'missing-host-toolchain'
  /**
   * Neither the registry nor the local cache produced a version for a crate. The crate is recorded as failed.
   */
  | 'no-versions-resolved'
  /**
   * An architecture could not be built after the retry/patch sequence was exhausted.
   */
  | 'build-failed'
  /**
   * The build reported success but the expected rlib is not on disk.
   */
  | 'artifact-not-found'
  /**
   * The persisted run state could not be read. Recovered by starting from a fresh state.
   */
  | 'state-corruption'

export class FactoryError extends Error {
  constructor(
    m: string,
    readonly kind: FailureKind,
  ) {
    super(m)

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, FactoryError.prototype)
  }
}

export class TransientNetworkError extends FactoryError {
  constructor(
    readonly url: string,
    readonly attempts: number,
    cause: string,
  ) {
    super(`GET ${url} failed after ${attempts} attempt(s): ${cause}`, 'transient-network')
    Object.setPrototypeOf(this, TransientNetworkError.prototype)
  }
}

export class MissingHostToolchainError extends FactoryError {
  constructor(readonly missing: string[]) {
    super(`Missing host tools: ${missing.join(', ')}. Install them first (e.g. apt: cargo rustc).`, 'missing-host-toolchain')
    Object.setPrototypeOf(this, MissingHostToolchainError.prototype)
  }
}

export class NoVersionsResolvedError extends FactoryError {
  constructor(readonly crateName: string) {
    super(`no versions found for ${crateName}`, 'no-versions-resolved')
    Object.setPrototypeOf(this, NoVersionsResolvedError.prototype)
  }
}

export class BuildFailedError extends FactoryError {
  constructor(
    m: string,
    readonly lastStatus: string,
  ) {
    super(m, 'build-failed')
    Object.setPrototypeOf(this, BuildFailedError.prototype)
  }
}

export class ArtifactNotFoundError extends FactoryError {
  constructor(readonly expectedPath: string) {
    super(`rlib not found at ${expectedPath}`, 'artifact-not-found')
    Object.setPrototypeOf(this, ArtifactNotFoundError.prototype)
  }
}

export class StateCorruptionError extends FactoryError {
  constructor(
    readonly stateFile: string,
    cause: string,
  ) {
    super(`unreadable run state at ${stateFile} (${cause}); starting fresh`, 'state-corruption')
    Object.setPrototypeOf(this, StateCorruptionError.prototype)
  }
}

export function isFactoryError(err: unknown, kind?: FailureKind): err is FactoryError {
  return err instanceof FactoryError && (kind === undefined || err.kind === kind)
}
