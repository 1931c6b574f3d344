import { LLM, type BaseLLMCallOptions, type BaseLLMParams } from '@langchain/core/language_models/llms';
import type { CallbackManagerForLLMRun } from '@langchain/core/callbacks/manager';
import { ConfigurationError, WriterAPIError } from '../../lib/errors';
import { DEFAULT_WRITER_MODEL } from '../../lib/config';
import { mergeCompletionParams, type WriterCompletionParams } from './params';
import { enforceStopTokens } from './stopTokens';

export const WRITER_API_BASE = 'https://enterprise-api.writer.com/llm';

/**
 * The slice of `fetch` the Writer client relies on.
 */
export type WriterFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface WriterCredentials {
  apiKey: string;
  orgId: string;
}

export interface WriterInput extends BaseLLMParams, WriterCompletionParams {
  /** Writer API key. */
  apiKey?: string;
  /** Writer organization ID. */
  orgId?: string;
  /** Model name to use. */
  modelId?: string;
  /** Full completions URL. When unset it is derived from orgId and modelId. */
  baseUrl?: string;
  /** Transport override, defaults to the global `fetch`. */
  fetch?: WriterFetch;
}

export interface WriterCallOptions extends BaseLLMCallOptions {
  /** Per-call overrides merged over the instance defaults. */
  params?: WriterCompletionParams;
}

/**
 * Pick Writer credentials from explicit fields first, then from the
 * `WRITER_API_KEY` / `WRITER_ORG_ID` environment entries.
 */
export function resolveWriterCredentials(
  fields: Partial<WriterCredentials> = {},
  env: NodeJS.ProcessEnv = process.env
): WriterCredentials {
  const apiKey = fields.apiKey || env.WRITER_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(
      'Did not find Writer apiKey, please add an environment variable `WRITER_API_KEY` which contains it, or pass `apiKey` as a named parameter.'
    );
  }
  const orgId = fields.orgId || env.WRITER_ORG_ID;
  if (!orgId) {
    throw new ConfigurationError(
      'Did not find Writer orgId, please add an environment variable `WRITER_ORG_ID` which contains it, or pass `orgId` as a named parameter.'
    );
  }
  return { apiKey, orgId };
}

export function resolveWriterEndpoint({
  baseUrl,
  orgId,
  modelId,
}: {
  baseUrl?: string;
  orgId: string;
  modelId: string;
}): string {
  if (baseUrl !== undefined) {
    return baseUrl;
  }
  return `${WRITER_API_BASE}/organization/${orgId}/model/${modelId}/completions`;
}

/**
 * Writer LLM
 *
 * Wraps the Writer hosted completions API as a LangChain LLM. Each call is
 * a single POST; the raw response body is returned as the completion.
 *
 * @example
 * ```typescript
 * const writer = Writer.fromEnv({ modelId: 'palmyra-base' });
 * const text = await writer.invoke('Tell me a joke.', { stop: ['\n\n'] });
 * ```
 */
export class Writer extends LLM<WriterCallOptions> implements WriterCompletionParams {
  static lc_name() {
    return 'Writer';
  }

  get lc_secrets(): { [key: string]: string } | undefined {
    return { apiKey: 'WRITER_API_KEY', orgId: 'WRITER_ORG_ID' };
  }

  apiKey: string;
  orgId: string;
  modelId: string;
  baseUrl?: string;

  minTokens?: number;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  stop?: string[];
  presencePenalty?: number;
  repetitionPenalty?: number;
  bestOf?: number;
  logprobs?: boolean;
  n?: number;

  private fetchImpl: WriterFetch;

  constructor(fields: WriterInput = {}) {
    super(fields);

    if (!fields.apiKey) {
      throw new ConfigurationError('Writer client requires an apiKey');
    }
    if (!fields.orgId) {
      throw new ConfigurationError('Writer client requires an orgId');
    }

    this.apiKey = fields.apiKey;
    this.orgId = fields.orgId;
    this.modelId = fields.modelId ?? DEFAULT_WRITER_MODEL;
    this.baseUrl = fields.baseUrl;

    this.minTokens = fields.minTokens;
    this.maxTokens = fields.maxTokens;
    this.temperature = fields.temperature;
    this.topP = fields.topP;
    this.stop = fields.stop;
    this.presencePenalty = fields.presencePenalty;
    this.repetitionPenalty = fields.repetitionPenalty;
    this.bestOf = fields.bestOf;
    this.logprobs = fields.logprobs;
    this.n = fields.n;

    this.fetchImpl = fields.fetch ?? fetch;
  }

  /**
   * Create a client whose missing credentials are filled in from the
   * environment.
   */
  static fromEnv(fields: WriterInput = {}, env: NodeJS.ProcessEnv = process.env): Writer {
    return new Writer({ ...fields, ...resolveWriterCredentials(fields, env) });
  }

  _llmType(): string {
    return 'writer';
  }

  get endpoint(): string {
    return resolveWriterEndpoint({
      baseUrl: this.baseUrl,
      orgId: this.orgId,
      modelId: this.modelId,
    });
  }

  /**
   * Instance-level request parameters, before per-call overrides.
   */
  defaultParams(): WriterCompletionParams {
    return {
      minTokens: this.minTokens,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      topP: this.topP,
      stop: this.stop,
      presencePenalty: this.presencePenalty,
      repetitionPenalty: this.repetitionPenalty,
      bestOf: this.bestOf,
      logprobs: this.logprobs,
      n: this.n,
    };
  }

  invocationParams(options?: this['ParsedCallOptions']): Partial<WriterCompletionParams> {
    return mergeCompletionParams(this.defaultParams(), options?.params ?? {});
  }

  _identifyingParams(): Record<string, unknown> {
    return {
      modelId: this.modelId,
      orgId: this.orgId,
      ...this.invocationParams(),
    };
  }

  /**
   * Call out to Writer's completions endpoint.
   *
   * @param prompt The prompt to pass into the model
   * @param options `stop` truncates the returned text, `params` overrides defaults
   * @returns The raw response text, cut at the first stop sequence
   */
  async _call(
    prompt: string,
    options: this['ParsedCallOptions'],
    _runManager?: CallbackManagerForLLMRun
  ): Promise<string> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: {
        Authorization: this.apiKey,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({ prompt, ...this.invocationParams(options) }),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new WriterAPIError(response.status, text);
    }

    return options.stop ? enforceStopTokens(text, options.stop) : text;
  }
}
