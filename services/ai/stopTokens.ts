/**
 * Cut `text` immediately before the earliest occurrence of any stop
 * sequence. Returns `text` unchanged when none occurs.
 *
 * The Writer service does not reliably honour stop sequences itself, so
 * completions are truncated client-side.
 */
export function enforceStopTokens(text: string, stop: readonly string[]): string {
  let cut = -1;
  for (const sequence of stop) {
    if (!sequence) continue;
    const index = text.indexOf(sequence);
    if (index !== -1 && (cut === -1 || index < cut)) {
      cut = index;
    }
  }
  return cut === -1 ? text : text.slice(0, cut);
}
