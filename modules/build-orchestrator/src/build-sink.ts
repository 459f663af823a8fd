import { Logger } from 'logger'
import { describeError } from 'misc'

/**
 * Where the lines of a build transcript go: the factory's own status lines and the output of the build commands.
 */
export interface BuildSink {
  line(text: string): void
}

/**
 * Keeps every line in memory. Optionally mirrors each line to the console (or any other consumer); a failing mirror
 * never loses a line.
 */
export class CapturingSink implements BuildSink {
  private readonly lines_: string[] = []

  constructor(
    private readonly logger: Logger,
    private readonly mirror?: (text: string) => void,
  ) {}

  line(text: string) {
    this.lines_.push(text)
    if (!this.mirror) {
      return
    }
    try {
      this.mirror(text)
    } catch (e) {
      this.logger.debug(`mirroring a transcript line failed: ${describeError(e)}`)
    }
  }

  get lines(): readonly string[] {
    return this.lines_
  }

  get text() {
    return this.lines_.map(at => `${at}\n`).join('')
  }
}
