export type { DiagnosticReporter, BufferReporter } from './reporter.js'
export { stderrReporter, silentReporter, createBufferReporter } from './reporter.js'
