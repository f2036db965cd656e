import type { Reporter } from '@stint/core'
import type { Theme } from './theme.js'

/**
 * Reporter for terminal use: informational lines go to stdout unless quiet,
 * warnings always go to stderr.
 */
export class ConsoleReporter implements Reporter {
  constructor(
    private readonly stdout: (text: string) => void,
    private readonly stderr: (text: string) => void,
    private readonly theme: Theme,
    private readonly quiet: boolean,
  ) {}

  inform(message: string): void {
    if (!this.quiet) this.stdout(this.theme.info(message) + '\n')
  }

  warn(message: string): void {
    this.stderr(this.theme.warn(`Warning: ${message}`) + '\n')
  }

  error(message: string): void {
    this.stderr(this.theme.error(`Error: ${message}`) + '\n')
  }
}
