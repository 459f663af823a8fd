import { CommandResult, CommandRunner, RunOptions, SbfArch, targetTripleOf } from 'build-orchestrator'
import * as fse from 'fs-extra'
import * as path from 'path'

export interface CommandCall {
  command: string
  args: readonly string[]
  cwd: string | undefined
  env: NodeJS.ProcessEnv | undefined
}

export interface FakeReply {
  exitCode: number
  output?: string
  /**
   * Runs before the reply is returned (e.g., writes the files a real build would write).
   */
  effect?: (call: CommandCall) => Promise<void>
}

type Matcher = (call: CommandCall) => boolean

/**
 * A CommandRunner that answers from a script. Replies registered for a command are consumed in order; the last one
 * repeats. Unscripted commands fail with exit code 127.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: CommandCall[] = []
  private readonly handlers: { matches: Matcher; replies: FakeReply[] }[] = []

  on(command: string | Matcher, ...replies: FakeReply[]): this {
    const matches: Matcher = typeof command === 'string' ? call => path.basename(call.command) === command : command
    this.handlers.push({ matches, replies })
    return this
  }

  callsOf(command: string) {
    return this.calls.filter(at => path.basename(at.command) === command)
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: CommandCall = { command, args: [...args], cwd: options.cwd, env: options.env }
    this.calls.push(call)
    const handler = this.handlers.find(at => at.matches(call))
    const reply = handler ? (handler.replies.length > 1 ? handler.replies.shift() : handler.replies[0]) : undefined
    if (!reply) {
      return { exitCode: 127, output: `failed to start ${command}\n` }
    }
    await reply.effect?.(call)
    const output = reply.output ?? ''
    for (const line of output.split('\n').filter(Boolean)) {
      options.onLine?.(line)
    }
    return { exitCode: reply.exitCode, output }
  }
}

function archOf(call: CommandCall): SbfArch {
  const i = call.args.indexOf('--arch')
  const arch = i >= 0 ? call.args[i + 1] : undefined
  return arch === 'sbfv2' ? 'sbfv2' : 'sbfv1'
}

/**
 * A successful `cargo-build-sbf` run that leaves `lib<crate>.rlib` (and, optionally, dependency rlibs named by their
 * file stem) in the release directory of the requested architecture.
 */
export function buildsRlib(crateName: string, depStems: string[] = []): FakeReply {
  return {
    exitCode: 0,
    output: '    Finished release [optimized] target(s)\n',
    effect: async call => {
      const releaseDir = path.join(call.cwd ?? '.', 'target', targetTripleOf(archOf(call)), 'release')
      await fse.outputFile(path.join(releaseDir, `lib${crateName.replace(/-/g, '_')}.rlib`), `rlib of ${crateName}`)
      for (const stem of depStems) {
        await fse.outputFile(path.join(releaseDir, 'deps', `${stem}.rlib`), `rlib ${stem}`)
      }
    },
  }
}

/**
 * A successful `cargo-build-sbf` run that produces no rlib.
 */
export function buildsNothing(): FakeReply {
  return { exitCode: 0, output: '    Finished release [optimized] target(s)\n' }
}

export function failsWith(output: string): FakeReply {
  return { exitCode: 101, output: `error: ${output}\n` }
}
