import { MissingHostToolchainError } from 'factory-errors'
import * as fse from 'fs-extra'
import { Logger } from 'logger'
import * as os from 'os'
import * as path from 'path'

import { BuildSink } from './build-sink'
import { CommandRunner } from './command-runner'

export interface ToolchainDirs {
  /**
   * Holds one `solana-release-<version>` directory per installed release.
   */
  toolchainsDir: string
  /**
   * Holds one `<crate>-<version>` source tree per fetched crate version.
   */
  cratesDir: string
  /**
   * Holds `install-solana.sh`, `fetch-crate.sh` and `remove-solana.sh`.
   */
  scriptsDir: string
}

export const HOST_TOOLS = ['cargo', 'rustc'] as const

async function isDirectory(p: string) {
  try {
    return (await fse.stat(p)).isDirectory()
  } catch {
    return false
  }
}

async function isExecutable(p: string) {
  try {
    await fse.access(p, fse.constants.X_OK)
    return (await fse.stat(p)).isFile()
  } catch {
    return false
  }
}

/**
 * The on-disk toolchain releases and crate source trees, and the external scripts that install, fetch and remove them.
 */
export class Toolchain {
  private preflightDone = false

  constructor(
    private readonly runner: CommandRunner,
    readonly dirs: ToolchainDirs,
    private readonly logger: Logger,
    private readonly baseEnv: NodeJS.ProcessEnv = process.env,
    private readonly homeDir = os.homedir(),
  ) {}

  releaseDirOf(solanaVersion: string) {
    return path.join(this.dirs.toolchainsDir, `solana-release-${solanaVersion}`)
  }

  cargoBuildSbfOf(solanaVersion: string) {
    return path.join(this.releaseDirOf(solanaVersion), 'bin', 'cargo-build-sbf')
  }

  crateDirOf(crateName: string, version: string) {
    return path.join(this.dirs.cratesDir, `${crateName}-${version}`)
  }

  /**
   * The environment for child processes: the base environment plus `extra`, with `~/.cargo/bin` at the front of PATH
   * (when that directory exists and is not already on the PATH).
   */
  async envOf(extra: Record<string, string> = {}): Promise<NodeJS.ProcessEnv> {
    const ret: NodeJS.ProcessEnv = { ...this.baseEnv, ...extra }
    const cargoBin = path.join(this.homeDir, '.cargo', 'bin')
    if (!(await isDirectory(cargoBin))) {
      return ret
    }
    const current = ret.PATH ?? ''
    const parts = current ? current.split(path.delimiter) : []
    if (!parts.includes(cargoBin)) {
      ret.PATH = current ? `${cargoBin}${path.delimiter}${current}` : cargoBin
    }
    return ret
  }

  async findMissingHostTools(): Promise<string[]> {
    const env = await this.envOf()
    const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean)
    const ret: string[] = []
    for (const tool of HOST_TOOLS) {
      let found = false
      for (const dir of dirs) {
        if (await isExecutable(path.join(dir, tool))) {
          found = true
          break
        }
      }
      if (!found) {
        ret.push(tool)
      }
    }
    return ret
  }

  /**
   * Checks (once per instance) that the host build tools are installed.
   *
   * @throws MissingHostToolchainError
   */
  async preflight(): Promise<void> {
    if (this.preflightDone) {
      return
    }
    const missing = await this.findMissingHostTools()
    if (missing.length) {
      throw new MissingHostToolchainError(missing)
    }
    await fse.ensureDir(path.join(this.homeDir, '.cache', 'solana'))
    this.preflightDone = true
  }

  /**
   * Makes sure a toolchain release is installed, installing it when absent.
   */
  async ensureRelease(solanaVersion: string, sink: BuildSink): Promise<boolean> {
    const dir = this.releaseDirOf(solanaVersion)
    if (await fse.pathExists(dir)) {
      return true
    }
    sink.line(`Solana version ${solanaVersion} not found, installing...`)
    const code = await this.runScript('install-solana.sh', [solanaVersion], sink)
    return code === 0 && (await fse.pathExists(dir))
  }

  /**
   * Makes sure the source tree of a crate version is present, fetching it when absent.
   */
  async ensureCrate(crateName: string, version: string, sink: BuildSink): Promise<boolean> {
    const dir = this.crateDirOf(crateName, version)
    if (await fse.pathExists(dir)) {
      return true
    }
    sink.line(`Crate ${crateName} version ${version} not found, fetching...`)
    const code = await this.runScript('fetch-crate.sh', [crateName, version], sink)
    return code === 0 && (await fse.pathExists(dir))
  }

  async removeRelease(solanaVersion: string): Promise<boolean> {
    const code = await this.runScript('remove-solana.sh', [solanaVersion])
    if (code !== 0) {
      this.logger.warn(`removing toolchain ${solanaVersion} failed (exit code ${code})`)
    }
    return code === 0
  }

  private async runScript(name: string, args: string[], sink?: BuildSink) {
    const env = await this.envOf({ TOOLCHAINS_DIR: this.dirs.toolchainsDir, CRATES_DIR: this.dirs.cratesDir })
    const { exitCode } = await this.runner.run('bash', [path.join(this.dirs.scriptsDir, name), ...args], {
      cwd: this.dirs.scriptsDir,
      env,
      onLine: sink ? line => sink.line(line) : undefined,
    })
    return exitCode
  }
}
