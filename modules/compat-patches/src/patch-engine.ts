import { Logger } from 'logger'

import { downgradeLockfile, dropLockfile, PatchFunction, pinAhash, pinBlake3, rewriteBlake3Lock } from './patches'
import { hasAhashFailure, hasEdition2024Failure, hasLockfileV4Failure } from './signatures'

export type PatchName = 'ahash-pin' | 'lockfile-downgrade' | 'lockfile-drop' | 'blake3-lock-rewrite' | 'blake3-pin'

export interface PatchEvent {
  readonly patch: PatchName
  readonly description: string
}

/**
 * The state of one retry loop. `attempting`: a build is due. `patched`: the last failure was answered with a file
 * mutation, so another attempt is due. `exhausted`: no patch applies (or the attempt budget is spent).
 */
export type RetryState =
  | { readonly kind: 'attempting'; readonly attempt: number }
  | { readonly kind: 'patched'; readonly attempt: number; readonly event: PatchEvent }
  | { readonly kind: 'exhausted'; readonly attempt: number }

interface PatchStep {
  readonly name: PatchName
  readonly description: string
  readonly apply: PatchFunction
  /**
   * Once applied, the step is not tried again.
   */
  readonly once: boolean
}

interface PatchRule {
  readonly matches: (output: string) => boolean
  readonly steps: readonly PatchStep[]
  /**
   * Once one of these steps was applied the whole rule is skipped.
   */
  readonly retiredBy: readonly PatchName[]
}

/**
 * Failure signature -> patches, in priority order. The first step that mutates a file wins.
 */
export const PATCH_RULES: readonly PatchRule[] = [
  {
    matches: hasAhashFailure,
    steps: [{ name: 'ahash-pin', description: 'applying ahash pin', apply: pinAhash, once: true }],
    retiredBy: ['ahash-pin'],
  },
  {
    matches: hasLockfileV4Failure,
    steps: [
      { name: 'lockfile-downgrade', description: 'downgrading Cargo.lock version 4 -> 3', apply: downgradeLockfile, once: false },
      { name: 'lockfile-drop', description: 'dropping Cargo.lock v4', apply: dropLockfile, once: false },
    ],
    retiredBy: [],
  },
  {
    matches: hasEdition2024Failure,
    steps: [
      {
        name: 'blake3-lock-rewrite',
        description: 'patching blake3 lock entry 1.8.3 -> 1.8.2',
        apply: rewriteBlake3Lock,
        once: true,
      },
      { name: 'blake3-pin', description: 'pinning blake3 in Cargo.toml to 1.8.2', apply: pinBlake3, once: true },
    ],
    retiredBy: ['blake3-lock-rewrite'],
  },
]

export const MAX_BUILD_ATTEMPTS = 5

/**
 * Drives the "build, inspect failure, patch, rebuild" loop of a single crate directory and architecture. Each
 * failure applies at most one patch, so a loop makes at most `maxAttempts` builds.
 */
export class PatchSession {
  private readonly applied = new Set<PatchName>()
  private readonly events_: PatchEvent[] = []
  private state_: RetryState = { kind: 'attempting', attempt: 1 }

  constructor(
    private readonly crateDir: string,
    private readonly logger: Logger,
    private readonly maxAttempts = MAX_BUILD_ATTEMPTS,
    private readonly rules: readonly PatchRule[] = PATCH_RULES,
  ) {}

  get state(): RetryState {
    return this.state_
  }

  /**
   * The patches applied so far, in order.
   */
  get events(): readonly PatchEvent[] {
    return this.events_
  }

  /**
   * Whether another build attempt is due.
   */
  get shouldAttempt() {
    return this.state_.kind !== 'exhausted'
  }

  /**
   * Records a failed attempt and returns the next state.
   */
  async onFailure(output: string): Promise<RetryState> {
    if (this.state_.kind === 'exhausted') {
      return this.state_
    }
    const attempt = this.state_.attempt
    if (attempt >= this.maxAttempts) {
      this.state_ = { kind: 'exhausted', attempt }
      return this.state_
    }

    const event = await this.applyNextPatch(output)
    if (!event) {
      this.state_ = { kind: 'exhausted', attempt }
      return this.state_
    }

    this.events_.push(event)
    this.state_ = { kind: 'patched', attempt: attempt + 1, event }
    return this.state_
  }

  private async applyNextPatch(output: string): Promise<PatchEvent | undefined> {
    for (const rule of this.rules) {
      if (!rule.matches(output) || rule.retiredBy.some(at => this.applied.has(at))) {
        continue
      }
      for (const step of rule.steps) {
        if (step.once && this.applied.has(step.name)) {
          continue
        }
        this.logger.info(`trying patch ${step.name} in ${this.crateDir}`)
        if (await step.apply(this.crateDir)) {
          this.applied.add(step.name)
          return { patch: step.name, description: step.description }
        }
      }
    }
    return undefined
  }
}
