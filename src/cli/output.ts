/**
 * Consistent CLI output helpers.
 *
 * Data (catalogs, sync messages) goes to stdout; everything meant for a
 * person goes to stderr so stdout stays machine-readable.
 */
export const output = {
  /** Write a machine-readable payload to stdout. */
  data(text: string): void {
    process.stdout.write(text.endsWith('\n') ? text : text + '\n')
  },

  /** Write an informational message to stderr. */
  info(message: string): void {
    process.stderr.write(message + '\n')
  },

  /** Write a success message to stderr, prefixed with "OK:". */
  success(message: string): void {
    process.stderr.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a warning message to stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },
}
