import { selectCrates } from 'crate-versions'
import { isFactoryError, NoVersionsResolvedError } from 'factory-errors'
import { describeError, fileTimestamp, nowIso, shouldNeverHappen } from 'misc'
import * as path from 'path'
import { classify, compressVersions, RunRecord, RunState, RunSummary } from 'run-state'

import { CrateRunner } from './crate-runner'
import { Factory } from './factory'
import { compilerCandidates, configEcho } from './factory-config'

export interface BatchResult {
  exitCode: number
  /**
   * Undefined on a dry run.
   */
  summaryFile?: string
  stateFile: string
  totals: string
  interrupted: boolean
}

export const INTERRUPTED_EXIT_CODE = 130

/**
 * Runs the selected crates one after the other. The run state is consulted before, and persisted after, every crate,
 * so an interrupted batch resumes where it stopped.
 */
export class BatchDriver {
  private readonly crateRunner: CrateRunner

  constructor(private readonly factory: Factory) {
    this.crateRunner = new CrateRunner(factory)
  }

  async selectedCrates(): Promise<string[]> {
    const { config, crateSets } = this.factory
    const crates = selectCrates(await crateSets.resolve(config.scope), config)
    if (!crates.length) {
      throw new Error('no crates selected after filters')
    }
    return crates
  }

  /**
   * @throws MissingHostToolchainError before any crate is processed.
   */
  async run(signal?: AbortSignal): Promise<BatchResult> {
    const { config, logger, stateStore } = this.factory
    const crates = await this.selectedCrates()
    logger.print(`Selected ${crates.length} crates (scope=${config.scope}, latest_only=${config.latestOnly})`)

    if (config.dryRun) {
      return await this.dryRun(crates)
    }
    await this.factory.toolchain.preflight()

    const state = await stateStore.load()
    state.meta.config = configEcho(config)
    const summary = new RunSummary({
      selectedCrates: crates.length,
      scope: config.scope,
      latestOnly: config.latestOnly,
      solanaVersion: config.solanaVersion,
      compilerVersion: config.compilerVersion,
      fallbackCompilerVersion: config.fallbackCompilerVersion,
      toolsVersion: config.toolsVersion,
    })

    let interrupted = false
    for (const [i, crateName] of crates.entries()) {
      const tag = `[${i + 1}/${crates.length}]`
      if (signal?.aborted) {
        logger.warn(`${tag} interrupted, ${crates.length - i} crate(s) left`)
        interrupted = true
        break
      }
      const previous = state.crates[crateName]
      if (previous && this.isSettled(previous)) {
        logger.print(`${tag} skip ${crateName}: already ${previous.status}`)
        summary.skipped()
        continue
      }

      try {
        const done = await this.processCrate(crateName, tag, state, summary, signal)
        if (!done) {
          interrupted = true
          break
        }
      } catch (e) {
        if (isFactoryError(e, 'missing-host-toolchain')) {
          throw e
        }
        const noVersions = isFactoryError(e, 'no-versions-resolved')
        if (noVersions) {
          logger.warn(`${tag} fail ${crateName}: no versions found`)
        } else {
          logger.error(`${tag} failed ${crateName}`, e)
        }
        summary.failed(crateName, noVersions ? 'no_versions' : 'error')
        const error = noVersions ? 'no versions found' : describeError(e)
        await stateStore.persist(state, { ...this.recordBase(crateName), status: 'failed', error })
      }
    }

    const summaryFile = path.join(config.stateDir, `run-latest-${fileTimestamp(this.factory.now())}.summary`)
    await summary.write(summaryFile)
    logger.print(`Done: ${summary.totals()}`, 'high')
    logger.print(`State: ${stateStore.stateFile}`, 'high')
    logger.print(`Summary: ${summaryFile}`, 'high')

    const exitCode = interrupted ? INTERRUPTED_EXIT_CODE : summary.count('failed') > 0 ? 1 : 0
    return { exitCode, summaryFile, stateFile: stateStore.stateFile, totals: summary.totals(), interrupted }
  }

  private isSettled(previous: RunRecord) {
    const { force, retryFailed } = this.factory.config
    if (force) {
      return false
    }
    return !(retryFailed && previous.status === 'failed')
  }

  private recordBase(crateName: string) {
    return { crate: crateName, builtCount: 0, totalCount: 0, timestamp: nowIso(this.factory.now()) }
  }

  /**
   * Returns false when the crate was interrupted (and therefore not recorded).
   *
   * @throws NoVersionsResolvedError
   */
  private async processCrate(
    crateName: string,
    tag: string,
    state: RunState,
    summary: RunSummary,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    const { config, logger, stateStore } = this.factory
    const versions = await this.factory.versions.resolveForBuild(crateName, config.latestOnly)
    if (!versions.length) {
      throw new NoVersionsResolvedError(crateName)
    }

    logger.print(`${tag} build ${crateName} (${config.latestOnly ? 'latest' : `${versions.length} versions`})`)
    const result = await this.crateRunner.run(crateName, versions, signal)
    if (result.interrupted) {
      logger.warn(`${tag} interrupted while building ${crateName}; not recorded`)
      return false
    }

    const { status, builtCount, totalCount } = classify(result.logText, result.exitCode)
    await stateStore.persist(state, {
      crate: crateName,
      status,
      builtCount,
      totalCount,
      timestamp: nowIso(this.factory.now()),
      logPath: result.logPath,
      requestedVersions: compressVersions(versions),
      patches: result.patches,
    })

    const where = `(log: ${result.logPath})`
    if (status === 'ok') {
      summary.ok(crateName)
      logger.print(`${tag} ok ${crateName}: ${builtCount}/${totalCount}`)
    } else if (status === 'partial') {
      summary.partial(crateName, builtCount, totalCount)
      logger.warn(`${tag} partial ${crateName}: ${builtCount}/${totalCount} ${where}`)
    } else if (status === 'no_rlib') {
      summary.noRlib(crateName)
      logger.warn(`${tag} no_rlib ${crateName} ${where}`)
    } else if (status === 'failed') {
      summary.failed(crateName, 'build')
      logger.warn(`${tag} failed ${crateName} ${where}`)
    } else {
      shouldNeverHappen(status)
    }
    return true
  }

  private async dryRun(crates: readonly string[]): Promise<BatchResult> {
    const { config, logger, stateStore } = this.factory
    const compilers = compilerCandidates(config).join(', ')
    for (const [i, crateName] of crates.entries()) {
      const versions = await this.factory.versions.resolveForBuild(crateName, config.latestOnly)
      const listed = versions.length ? compressVersions(versions).join(' ') : '<none>'
      logger.print(`[${i + 1}/${crates.length}] [dry-run] ${crateName}: versions=${listed} compilers=${compilers}`)
    }
    return { exitCode: 0, stateFile: stateStore.stateFile, totals: `selected=${crates.length}`, interrupted: false }
  }
}
