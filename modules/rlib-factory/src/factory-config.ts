import { CrateScope } from 'crate-versions'
import * as fs from 'fs'
import * as JsoncParser from 'jsonc-parser'
import { describeError } from 'misc'
import * as path from 'path'
import { z } from 'zod'

export const FactoryConfig = z
  .object({
    solanaVersion: z
      .string()
      .default('1.18.16')
      .describe('The Solana release the crates are collected for. Recorded in the run state and the run summary.'),
    compilerVersion: z
      .string()
      .default('1.18.16')
      .describe('The toolchain release (cargo-build-sbf) used for the first build of every crate version.'),
    fallbackCompilerVersion: z
      .string()
      .default('1.18.16')
      .describe('The toolchain release to retry with when a build fails in a compiler-related way.'),
    disableCompilerFallback: z.boolean().default(false).describe('Never retry with the fallback toolchain.'),
    toolsVersion: z
      .string()
      .default('v1.48')
      .describe('Passed to cargo-build-sbf as --tools-version. Also part of every artifact name.'),
    sbfArch: z
      .enum(['auto', 'sbfv1', 'sbfv2', 'both'])
      .default('auto')
      .describe('Target architectures. "auto" picks sbfv2 for crate versions 2.x and above, sbfv1 otherwise.'),
    scope: CrateScope.default('solana').describe('Which crates to build: solana, solana-all, anchor or all.'),
    latestOnly: z.boolean().default(false).describe('Build only the latest version of each crate.'),
    include: z.string().optional().describe('Only crates matching this regular expression.'),
    exclude: z.string().optional().describe('Skip crates matching this regular expression.'),
    maxCrates: z.number().int().nonnegative().default(0).describe('Build at most this many crates (0: no limit).'),
    force: z.boolean().default(false).describe('Rebuild crates that already have a recorded outcome.'),
    retryFailed: z.boolean().default(false).describe('Rebuild crates whose recorded outcome is "failed".'),
    cleanupTarget: z.boolean().default(false).describe(`Delete a crate's target/ directory after extraction.`),
    cleanupToolchain: z
      .boolean()
      .default(false)
      .describe('Remove the toolchain release after each crate version (runs remove-solana.sh).'),
    extractDeps: z.boolean().default(true).describe('Also copy the dependency rlibs of every build.'),
    stream: z.boolean().default(true).describe('Mirror build output to the terminal.'),
    dryRun: z.boolean().default(false).describe('Print the plan without building anything.'),
    versionsDir: z.string().default('versions').describe('Version lists and crate lists (relative to the factory dir).'),
    stateDir: z.string().default('run-state').describe('Run state, per-crate logs and run summaries.'),
    rlibsDir: z.string().default('rlibs').describe('Extracted artifacts.'),
    cratesDir: z.string().default('crates').describe('Crate source trees.'),
    toolchainsDir: z.string().default('solana').describe('Installed toolchain releases.'),
    scriptsDir: z.string().default('.').describe('install-solana.sh, fetch-crate.sh and remove-solana.sh.'),
  })
  .strict()
export type FactoryConfig = z.infer<typeof FactoryConfig>

const DIRECTORY_KEYS = ['versionsDir', 'stateDir', 'rlibsDir', 'cratesDir', 'toolchainsDir', 'scriptsDir'] as const

/**
 * The effective configuration: directories are absolute.
 */
export type ResolvedConfig = FactoryConfig & { factoryDir: string }

export const CONFIG_FILES = ['.rlib-factory.jsonc', '.rlib-factory.json']

export function resolveConfigFile(factoryDir: string): string | undefined {
  const existing = CONFIG_FILES.map(at => path.join(factoryDir, at)).filter(at => fs.existsSync(at))
  if (existing.length > 1) {
    throw new Error(`Found competing config files: ${existing.join(', ')}. To avoid confusion, you must keep just one.`)
  }
  return existing.at(0)
}

/**
 * Reads a (JSON with comments) config file. Returns `{}` when there is no file.
 */
export function readConfigFile(file: string | undefined): Record<string, unknown> {
  if (file === undefined || !fs.existsSync(file)) {
    return {}
  }
  try {
    const content = fs.readFileSync(file, 'utf-8')
    const errors: JsoncParser.ParseError[] = []
    const parsed: unknown = JsoncParser.parse(content, errors, { allowTrailingComma: true, allowEmptyContent: true })
    const e = errors.at(0)
    if (e) {
      throw new Error(`Bad format: ${JsoncParser.printParseErrorCode(e.error)} at position ${e.offset}`)
    }
    return z.record(z.unknown()).parse(parsed ?? {})
  } catch (e) {
    throw new Error(`could not read config file ${file} - ${describeError(e)}`)
  }
}

/**
 * defaults <- config file <- overrides (typically, command line flags). Undefined overrides are ignored.
 */
export function resolveConfig(
  factoryDir: string,
  fromFile: Record<string, unknown>,
  overrides: Partial<FactoryConfig> = {},
): ResolvedConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([_, v]) => v !== undefined))
  const parsed = FactoryConfig.parse({ ...fromFile, ...defined })
  const ret: ResolvedConfig = { ...parsed, factoryDir: path.resolve(factoryDir) }
  for (const k of DIRECTORY_KEYS) {
    ret[k] = path.resolve(ret.factoryDir, parsed[k])
  }
  return ret
}

export function loadConfig(factoryDir: string, overrides: Partial<FactoryConfig> = {}): ResolvedConfig {
  return resolveConfig(factoryDir, readConfigFile(resolveConfigFile(factoryDir)), overrides)
}

/**
 * The part of the configuration that is echoed into the run state.
 */
export function configEcho(config: ResolvedConfig): Record<string, unknown> {
  return {
    solanaVersion: config.solanaVersion,
    compilerVersion: config.compilerVersion,
    fallbackCompilerVersion: config.fallbackCompilerVersion,
    disableCompilerFallback: config.disableCompilerFallback,
    toolsVersion: config.toolsVersion,
    sbfArch: config.sbfArch,
    scope: config.scope,
    latestOnly: config.latestOnly,
  }
}

/**
 * The compilers to try, in order: the primary one, then the fallback (unless disabled or identical).
 */
export function compilerCandidates(config: FactoryConfig): string[] {
  const ret = [config.compilerVersion]
  if (!config.disableCompilerFallback && config.fallbackCompilerVersion && !ret.includes(config.fallbackCompilerVersion)) {
    ret.push(config.fallbackCompilerVersion)
  }
  return ret
}
