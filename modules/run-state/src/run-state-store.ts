import { StateCorruptionError } from 'factory-errors'
import * as fse from 'fs-extra'
import { Logger } from 'logger'
import { describeError, failMe, nowIso, writeFileAtomic } from 'misc'
import jsonStringify from 'safe-stable-stringify'

import { RunRecord, RunState, StoredRunState } from './run-state-schema'

/**
 * Persists the run state as a single JSON document. A missing or unreadable file yields a fresh state; an invalid
 * record is dropped (so its crate is built again) while the other records are kept.
 */
export class RunStateStore {
  constructor(
    readonly stateFile: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  fresh(): RunState {
    return { meta: { createdAt: nowIso(this.now()) }, crates: {} }
  }

  async load(): Promise<RunState> {
    if (!(await fse.pathExists(this.stateFile))) {
      return this.fresh()
    }
    let stored: StoredRunState
    try {
      const content = await fse.readFile(this.stateFile, 'utf-8')
      stored = StoredRunState.parse(JSON.parse(content))
    } catch (e) {
      const err = new StateCorruptionError(this.stateFile, describeError(e))
      this.logger.warn(err.message)
      return this.fresh()
    }

    const crates: Record<string, RunRecord> = {}
    for (const [crateName, raw] of Object.entries(stored.crates)) {
      const parsed = RunRecord.safeParse(raw)
      if (parsed.success) {
        crates[crateName] = parsed.data
      } else {
        const issues = parsed.error.issues.map(at => `${at.path.join('.') || '<root>'}: ${at.message}`).join('; ')
        this.logger.warn(`dropping unreadable run state record of ${crateName} (${issues})`)
      }
    }
    return RunState.parse({ ...stored, crates })
  }

  /**
   * Stamps `meta.updatedAt` and replaces the file atomically.
   */
  async save(state: RunState): Promise<void> {
    state.meta.updatedAt = nowIso(this.now())
    const text = jsonStringify(state, null, 2) ?? failMe('run state is not serializable')
    await writeFileAtomic(this.stateFile, `${text}\n`)
  }

  /**
   * Stores `record` under its crate name and persists the state.
   */
  async persist(state: RunState, record: RunRecord): Promise<void> {
    state.crates[record.crate] = record
    await this.save(state)
  }
}
