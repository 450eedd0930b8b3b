// =============================================================================
// formatKey — printable, length-bounded rendering of arbitrary keys/values
// =============================================================================

const MAX_LENGTH = 64;

/**
 * Render any key or value as short text for log lines and `toString()`.
 *
 * Strings print bare, symbols and bigints use their own `toString()`,
 * plain objects and arrays go through JSON, and anything JSON refuses
 * (cycles, functions) falls back to its constructor name. Output longer
 * than 64 characters is cut and suffixed with `…`.
 */
export function formatKey(input: unknown): string {
  return truncate(render(input));
}

function render(input: unknown): string {
  if (typeof input === 'string') return input;
  if (typeof input === 'symbol' || typeof input === 'bigint') return input.toString();
  if (typeof input === 'function') return `[Function ${input.name || 'anonymous'}]`;
  if (input === null || typeof input !== 'object') return String(input);

  try {
    return JSON.stringify(input);
  } catch {
    return `[${input.constructor?.name ?? 'Object'}]`;
  }
}

function truncate(text: string): string {
  return text.length > MAX_LENGTH ? `${text.slice(0, MAX_LENGTH)}…` : text;
}
