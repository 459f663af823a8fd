import { Logger } from 'logger'

/**
 * A Logger that keeps the messages it was given. `error()` messages are kept with the warnings.
 */
export class RecordingLogger implements Logger {
  readonly printed: string[] = []
  readonly warnings: string[] = []
  readonly infos: string[] = []

  print(message: string) {
    this.printed.push(message)
  }
  warn(message: string) {
    this.warnings.push(message)
  }
  info(message: string) {
    this.infos.push(message)
  }
  debug() {
    // noop
  }
  error(message: string) {
    this.warnings.push(message)
  }
}
