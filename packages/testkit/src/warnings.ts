/**
 * Collects dev warnings passed to a `warn` callback so tests can assert on them.
 */
export type WarningRecorder = Readonly<{
  warn: (message: string) => void;
  messages: readonly string[];
  clear: () => void;
}>;

export function recordWarnings(): WarningRecorder {
  const messages: string[] = [];
  return {
    warn: (message) => {
      messages.push(message);
    },
    messages,
    clear: () => {
      messages.length = 0;
    },
  };
}
