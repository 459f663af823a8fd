import execa from 'execa'
import { Logger } from 'logger'
import { describeError } from 'misc'
import * as readline from 'readline'

export interface RunOptions {
  cwd?: string
  /**
   * The complete environment of the child process.
   */
  env?: NodeJS.ProcessEnv
  /**
   * Receives every line of the combined stdout/stderr as it arrives.
   */
  onLine?: (line: string) => void
}

export interface CommandResult {
  exitCode: number
  /**
   * The combined stdout/stderr text.
   */
  output: string
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>
}

/**
 * The exit code reported for a command that could not be started.
 */
export const SPAWN_FAILURE_EXIT_CODE = 127

export class ExecaCommandRunner implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const summary = [command, ...args].join(' ')
    this.logger.info(`running ${summary} (cwd=${options.cwd ?? process.cwd()})`)
    const child = execa(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      extendEnv: options.env === undefined,
      all: true,
      reject: false,
      stdin: 'ignore',
    })

    const lines = child.all ? readline.createInterface({ input: child.all, crlfDelay: Infinity }) : undefined
    lines?.on('line', line => {
      try {
        options.onLine?.(line)
      } catch (e) {
        this.logger.debug(`line consumer failed: ${describeError(e)}`)
      }
    })

    const p = await child
    if (typeof p.exitCode !== 'number') {
      this.logger.info(`could not start ${summary}`)
      return { exitCode: SPAWN_FAILURE_EXIT_CODE, output: `${p.all ?? ''}failed to start ${command}\n` }
    }

    this.logger.info(`exitCode of ${summary} is ${p.exitCode}`)
    return { exitCode: p.exitCode, output: p.all ?? '' }
  }
}
