/**
 * Consistent CLI output helpers.
 *
 * All output uses process.stdout/stderr.write for testability.
 * No colors, no emojis -- clean text output only.
 */
export const output = {
  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /**
   * Write a result table to stdout: a header line, a dashed rule, then one
   * line per row. Columns are padded to their widest cell and separated by
   * two spaces; trailing padding is trimmed.
   */
  table(columns: string[], rows: string[][]): void {
    const widths = columns.map((c, i) =>
      Math.max(c.length, ...rows.map((row) => (row[i] ?? '').length)),
    )
    const line = (cells: string[]): string =>
      columns.map((_, i) => (cells[i] ?? '').padEnd(widths[i])).join('  ').trimEnd()

    process.stdout.write(line(columns) + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(line(row) + '\n')
    }
  },
}
