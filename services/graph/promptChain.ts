import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BasePromptTemplate } from '@langchain/core/prompts';
import type { LanguageModelLike } from '@langchain/core/language_models/base';
import type { Runnable } from '@langchain/core/runnables';

/**
 * A prompt-to-completion step: named string inputs in, a record holding at
 * least `outputKey` out.
 */
export interface CompletionChain {
  readonly outputKey: string;
  run(inputs: Record<string, string>): Promise<Record<string, string>>;
}

export interface PromptChainInput {
  llm: LanguageModelLike;
  prompt: BasePromptTemplate;
  outputKey?: string;
}

/**
 * Renders a prompt template, sends it to the model and returns the reply
 * as plain text under `outputKey` (default `text`).
 */
export class PromptChain implements CompletionChain {
  readonly outputKey: string;
  private sequence: Runnable<Record<string, string>, string>;

  constructor({ llm, prompt, outputKey = 'text' }: PromptChainInput) {
    this.outputKey = outputKey;
    this.sequence = prompt.pipe(llm).pipe(new StringOutputParser());
  }

  async run(inputs: Record<string, string>): Promise<Record<string, string>> {
    const text = await this.sequence.invoke(inputs);
    return { [this.outputKey]: text };
  }
}
