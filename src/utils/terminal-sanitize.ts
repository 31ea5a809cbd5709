/**
 * Strips ANSI/OSC escape sequences and control characters from text that is
 * about to be written to a terminal. Service responses and scanner messages
 * are untrusted.
 */
export function sanitizeForTerminal(input: string): string {
  return (
    input
      // CSI
      .replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, "")
      // OSC (hyperlinks, window titles)
      .replace(/\x1B\][^\x07\x1b]{0,10000}(\x07|\x1B\\)/g, "")
      .replace(/\x1B[0-9@-Z\\-_]/g, "")
      .replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, "")
  );
}
