import { ArtifactExtractor } from 'artifact-extractor'
import { BuildOrchestrator, CommandRunner, ExecaCommandRunner, Toolchain } from 'build-orchestrator'
import { CrateLists, CrateRegistry, CrateSetResolver, RegistryClient, VersionResolver } from 'crate-versions'
import { Logger } from 'logger'
import * as os from 'os'
import * as path from 'path'
import { RunStateStore } from 'run-state'

import { ResolvedConfig } from './factory-config'

export const STATE_FILE_NAME = 'latest-build-state.json'
export const LOGS_DIR_NAME = 'logs-latest'

export interface FactoryOptions {
  registry?: CrateRegistry
  /**
   * The static crate lists behind the scopes. Defaults to the lists shipped with the factory.
   */
  crateLists?: CrateLists
  runner?: CommandRunner
  env?: NodeJS.ProcessEnv
  homeDir?: string
  now?: () => Date
  /**
   * Receives build output lines when streaming is on. Defaults to stdout.
   */
  console?: (line: string) => void
}

/**
 * Wires the components of a factory run together from a resolved configuration.
 */
export class Factory {
  readonly registry: CrateRegistry
  readonly runner: CommandRunner
  readonly toolchain: Toolchain
  readonly orchestrator: BuildOrchestrator
  readonly extractor: ArtifactExtractor
  readonly versions: VersionResolver
  readonly crateSets: CrateSetResolver
  readonly stateStore: RunStateStore
  readonly now: () => Date
  readonly console: (line: string) => void

  constructor(
    readonly config: ResolvedConfig,
    readonly logger: Logger,
    options: FactoryOptions = {},
  ) {
    this.registry = options.registry ?? new RegistryClient(logger)
    this.runner = options.runner ?? new ExecaCommandRunner(logger)
    this.now = options.now ?? (() => new Date())
    this.console = options.console ?? (line => process.stdout.write(`${line}\n`))
    this.toolchain = new Toolchain(
      this.runner,
      { toolchainsDir: config.toolchainsDir, cratesDir: config.cratesDir, scriptsDir: config.scriptsDir },
      logger,
      options.env ?? process.env,
      options.homeDir ?? os.homedir(),
    )
    this.orchestrator = new BuildOrchestrator(this.toolchain, this.runner, logger)
    this.extractor = new ArtifactExtractor(config.rlibsDir, logger)
    this.versions = new VersionResolver(this.registry, config.versionsDir, logger)
    this.crateSets = new CrateSetResolver(this.registry, config.versionsDir, logger, options.crateLists)
    this.stateStore = new RunStateStore(path.join(config.stateDir, STATE_FILE_NAME), logger, this.now)
  }

  logFileOf(crateName: string) {
    return path.join(this.config.stateDir, LOGS_DIR_NAME, `${crateName}.log`)
  }
}
