import { ReleasePacker, RlibCollector } from 'artifact-extractor'
import { ArchSelection } from 'build-orchestrator'
import { CrateScope } from 'crate-versions'
import { isFactoryError } from 'factory-errors'
import * as fse from 'fs-extra'
import { createDefaultLogger, Criticality, Logger } from 'logger'
import { camelizeRecord, describeError } from 'misc'
import * as path from 'path'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'

import { BatchDriver, INTERRUPTED_EXIT_CODE } from './batch-driver'
import { configTemplate } from './config-template'
import { Factory } from './factory'
import { CONFIG_FILES, FactoryConfig, loadConfig, ResolvedConfig } from './factory-config'
import { buildSingle } from './single-build'

const MISSING_HOST_TOOLCHAIN_EXIT_CODE = 2

const SBF_ARCHS = ['auto', 'sbfv1', 'sbfv2', 'both'] as const

interface Flags {
  factoryDir: string
  loudness: string
  solanaVersion?: string
  compilerVersion?: string
  fallbackCompilerVersion?: string
  disableCompilerFallback?: boolean
  toolsVersion?: string
  sbfArch?: ArchSelection
  scope?: CrateScope
  latestOnly?: boolean
  allVersions?: boolean
  include?: string
  exclude?: string
  maxCrates?: number
  force?: boolean
  retryFailed?: boolean
  cleanupTarget?: boolean
  cleanupToolchain?: boolean
  extractDeps?: boolean
  stream?: boolean
  dryRun?: boolean
  versionsDir?: string
  stateDir?: string
}

function overridesOf(flags: Flags): Partial<FactoryConfig> {
  return {
    solanaVersion: flags.solanaVersion,
    compilerVersion: flags.compilerVersion,
    fallbackCompilerVersion: flags.fallbackCompilerVersion,
    disableCompilerFallback: flags.disableCompilerFallback,
    toolsVersion: flags.toolsVersion,
    sbfArch: flags.sbfArch,
    scope: flags.scope,
    latestOnly: flags.allVersions ? false : flags.latestOnly,
    include: flags.include,
    exclude: flags.exclude,
    maxCrates: flags.maxCrates,
    force: flags.force,
    retryFailed: flags.retryFailed,
    cleanupTarget: flags.cleanupTarget,
    cleanupToolchain: flags.cleanupToolchain,
    extractDeps: flags.extractDeps,
    stream: flags.stream,
    dryRun: flags.dryRun,
    versionsDir: flags.versionsDir,
    stateDir: flags.stateDir,
  }
}

async function makeFactory(flags: Flags) {
  const config: ResolvedConfig = loadConfig(flags.factoryDir, overridesOf(flags))
  await fse.ensureDir(config.stateDir)
  const logFile = path.join(config.stateDir, 'main.log')
  const logger = createDefaultLogger(logFile, stringToLoudness(flags.loudness))
  logger.info(`Logger initialized`)
  logger.print(`logging to ${logFile}`, 'low')
  return new Factory(config, logger)
}

/**
 * The first SIGINT/SIGTERM stops the batch after the current build; a second one exits right away.
 */
function abortOnSignals(logger: Logger): AbortController {
  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(INTERRUPTED_EXIT_CODE)
    }
    logger.warn(`received ${signal}, stopping after the current build`)
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
  return controller
}

async function run(flags: Flags, command: (factory: Factory) => Promise<number>) {
  let logger: Logger | undefined
  try {
    const factory = await makeFactory(flags)
    logger = factory.logger
    const exitCode = await command(factory)
    // eslint-disable-next-line require-atomic-updates
    process.exitCode = exitCode
  } catch (e) {
    const missingHostToolchain = isFactoryError(e, 'missing-host-toolchain')
    if (logger) {
      logger.error(missingHostToolchain ? describeError(e) : 'rlib-factory failed', e)
    } else {
      process.stderr.write(`rlib-factory: ${describeError(e)}\n`)
    }
    // eslint-disable-next-line require-atomic-updates
    process.exitCode = missingHostToolchain ? MISSING_HOST_TOOLCHAIN_EXIT_CODE : 1
  }
}

export function main() {
  return yargs(hideBin(process.argv))
    .scriptName('rlib-factory')
    .option('factory-dir', {
      describe: `the factory directory (holds '${CONFIG_FILES.join(`' or '`)}' and, by default, all data directories)`,
      type: 'string',
      default: process.cwd(),
    })
    .option('loudness', {
      describe: `how detailed should the progress report be. Values are T-shirt sizes:
          s - just the final summary and errors
          m - one line per crate
          l - everything, including the log file location`,
      choices: ['s', 'm', 'l'],
      default: 'm',
    })
    .option('solana-version', { describe: 'the Solana release the crates are collected for', type: 'string' })
    .option('compiler-version', {
      alias: 'compiler-solana-version',
      describe: 'the toolchain release used for the first build',
      type: 'string',
    })
    .option('fallback-compiler-version', {
      alias: 'fallback-compiler-solana-version',
      describe: 'the toolchain release to retry with on compiler-related failures',
      type: 'string',
    })
    .option('disable-compiler-fallback', { describe: 'never retry with the fallback toolchain', type: 'boolean' })
    .option('tools-version', { alias: 'platform-tools-version', describe: 'passed as --tools-version', type: 'string' })
    .option('sbf-arch', { alias: 'arch', describe: 'target architectures', choices: SBF_ARCHS })
    .option('scope', { describe: 'which crates to build', choices: CrateScope.options })
    .option('latest-only', { describe: 'build only the latest version of each crate', type: 'boolean' })
    .option('all-versions', { describe: 'build every non-yanked version (overrides --latest-only)', type: 'boolean' })
    .option('include', { describe: 'only crates matching this regex', type: 'string' })
    .option('exclude', { describe: 'skip crates matching this regex', type: 'string' })
    .option('max-crates', { describe: 'build at most this many crates (0: no limit)', type: 'number' })
    .option('force', { describe: 'rebuild crates that already have a recorded outcome', type: 'boolean' })
    .option('retry-failed', { describe: 'rebuild crates whose recorded outcome is "failed"', type: 'boolean' })
    .option('cleanup-target', { describe: `delete a crate's target/ directory after extraction`, type: 'boolean' })
    .option('cleanup-toolchain', {
      alias: 'cleanup-solana',
      describe: 'remove the toolchain release after each crate version',
      type: 'boolean',
    })
    .option('extract-deps', { describe: 'also copy dependency rlibs (--no-extract-deps to skip)', type: 'boolean' })
    .option('stream', { describe: 'mirror build output to the terminal (--no-stream to silence)', type: 'boolean' })
    .option('dry-run', { describe: 'print the plan without building', type: 'boolean' })
    .option('versions-dir', { describe: 'version lists and crate lists', type: 'string' })
    .option('state-dir', { describe: 'run state, per-crate logs and summaries', type: 'string' })
    .command(
      ['batch', '$0'],
      'build rlibs for every selected crate, resuming from the recorded run state',
      yargs => yargs,
      async rawArgv => {
        const flags: Flags = camelizeRecord(rawArgv)
        await run(flags, async factory => {
          const controller = abortOnSignals(factory.logger)
          const result = await new BatchDriver(factory).run(controller.signal)
          return result.exitCode
        })
      },
    )
    .command(
      'build <crate> <version>',
      'build a single crate version and extract its rlibs',
      yargs =>
        yargs
          .positional('crate', { describe: 'crate name', type: 'string', demandOption: true })
          .positional('version', { describe: 'crate version', type: 'string', demandOption: true }),
      async rawArgv => {
        const flags: Flags = camelizeRecord(rawArgv)
        await run(flags, async factory => {
          await factory.toolchain.preflight()
          const { exitCode, destinations } = await buildSingle(factory, rawArgv.crate, rawArgv.version)
          destinations.forEach(at => factory.logger.print(`saved ${at}`, 'high'))
          return exitCode
        })
      },
    )
    .command(
      'collect <out-dir>',
      'gather the rlibs of all crate builds and extracted artifacts into one directory',
      yargs => yargs.positional('out-dir', { describe: 'output directory', type: 'string', demandOption: true }),
      async rawArgv => {
        const flags: Flags = camelizeRecord(rawArgv)
        await run(flags, async factory => {
          const { config, logger } = factory
          const result = await new RlibCollector(logger).collect(path.resolve(rawArgv.outDir), {
            cratesDir: config.cratesDir,
            rlibsDir: config.rlibsDir,
          })
          logger.print(`Collected ${result.count} rlibs, listed in ${result.listFile}`, 'high')
          return 0
        })
      },
    )
    .command(
      'pack [out-dir]',
      'pack the artifact tree into release archives (core, crypto, anchor and extra bundles)',
      yargs =>
        yargs
          .positional('out-dir', { describe: 'output directory (default: <factory-dir>/releases)', type: 'string' })
          .option('individual', { describe: 'one archive per crate, under <out-dir>/individual', type: 'boolean' }),
      async rawArgv => {
        const flags: Flags = camelizeRecord(rawArgv)
        await run(flags, async factory => {
          const { config, logger } = factory
          const outDir = path.resolve(rawArgv.outDir ?? path.join(config.factoryDir, 'releases'))
          const packer = new ReleasePacker(config.rlibsDir, logger)
          const packed = rawArgv.individual
            ? await packer.packEach(path.join(outDir, 'individual'))
            : await packer.packBundles(outDir)
          logger.print(`Packed ${packed.length} archive(s) into ${outDir}`, 'high')
          return 0
        })
      },
    )
    .command(
      'init-config',
      'generate a config file with all available options commented out',
      yargs => yargs,
      async rawArgv => {
        const outputPath = path.join(rawArgv['factory-dir'], CONFIG_FILES[0])
        if (fse.existsSync(outputPath)) {
          process.stderr.write(`Error: ${outputPath} already exists. Remove it first if you want to regenerate.\n`)
          process.exitCode = 1
          return
        }
        await fse.writeFile(outputPath, configTemplate(FactoryConfig) + '\n')
        process.stdout.write(`Created ${outputPath}\n`)
      },
    )
    .strict()
    .parse()
}

function stringToLoudness(s: string): Criticality {
  if (s === 's') {
    return 'high'
  }

  if (s === 'm') {
    return 'moderate'
  }

  if (s === 'l') {
    return 'low'
  }

  throw new Error(`illegal loudness value: "${s}"`)
}
