/**
 * Generation options accepted by the Writer completions endpoint.
 * Anything left unset is omitted from the request body so the service
 * applies its own defaults.
 */
export type WriterCompletionParams = {
  /** Minimum number of tokens to generate. */
  minTokens?: number;
  /** Maximum number of tokens to generate. */
  maxTokens?: number;
  /** Sampling temperature. */
  temperature?: number;
  /** Total probability mass of tokens to consider at each step. */
  topP?: number;
  /** Sequences at which the service should stop generating. */
  stop?: string[];
  /** Penalizes repeated tokens regardless of frequency. */
  presencePenalty?: number;
  /** Penalizes repeated tokens according to frequency. */
  repetitionPenalty?: number;
  /** Generate this many completions server-side and return the best one. */
  bestOf?: number;
  /** Return log probabilities. */
  logprobs?: boolean;
  /** How many completions to generate. */
  n?: number;
};

/**
 * Right-biased merge of request parameters. An override only replaces a
 * default when it holds a value; `undefined` and `null` entries never make
 * it into the result.
 */
export function mergeCompletionParams<T extends Record<string, unknown>>(
  defaults: Readonly<T>,
  overrides?: Readonly<Partial<T>>
): Partial<T> {
  const merged: Partial<T> = {};
  for (const source of [defaults, overrides ?? {}]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value !== null) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}
