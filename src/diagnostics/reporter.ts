/**
 * Receives one line of diagnostic text per operational failure (failed
 * exec, compile, bind or step). Hosts pass their own to redirect or drop
 * the messages.
 */
export type DiagnosticReporter = (message: string) => void

/** Default reporter: one line per message on stderr. */
export const stderrReporter: DiagnosticReporter = (message) => {
  process.stderr.write(message + '\n')
}

/** Reporter that discards everything. */
export const silentReporter: DiagnosticReporter = () => undefined

/** A reporter that keeps every message it receives, in order. */
export interface BufferReporter extends DiagnosticReporter {
  readonly messages: string[]
}

/** Create a reporter that collects messages in memory. */
export function createBufferReporter(): BufferReporter {
  const messages: string[] = []
  const reporter: DiagnosticReporter = (message) => {
    messages.push(message)
  }
  return Object.assign(reporter, { messages })
}
