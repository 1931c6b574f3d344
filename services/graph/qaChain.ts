import type { BasePromptTemplate } from '@langchain/core/prompts';
import type { LanguageModelLike } from '@langchain/core/language_models/base';
import { CYPHER_GENERATION_PROMPT, CYPHER_QA_PROMPT } from './prompts';
import { noopObserver, type GraphQAObserver } from './observer';
import { PromptChain, type CompletionChain } from './promptChain';
import type { GraphStore } from './types';

export interface GraphQAChainInput<TResult> {
  graph: GraphStore<TResult>;
  cypherGenerationChain: CompletionChain;
  qaChain: CompletionChain;
  observer?: GraphQAObserver;
  inputKey?: string;
  outputKey?: string;
}

export interface GraphQAFromLLMOptions<TResult> extends Omit<GraphQAChainInput<TResult>, 'cypherGenerationChain' | 'qaChain'> {
  cypherPrompt?: BasePromptTemplate;
  qaPrompt?: BasePromptTemplate;
}

function bigintAsString(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Query results reach the answer prompt as text.
 */
export function contextToText(context: unknown): string {
  if (typeof context === 'string') {
    return context;
  }
  try {
    return JSON.stringify(context, bigintAsString) ?? String(context);
  } catch (error) {
    // circular structures
    if (!(error instanceof TypeError)) throw error;
    return String(context);
  }
}

function outputOf(result: Record<string, string>, key: string): string {
  const value = result[key];
  if (typeof value !== 'string') {
    throw new Error(`Completion chain returned no "${key}" output`);
  }
  return value;
}

/**
 * Graph QA Chain
 *
 * Answers a question against a graph in three sequential steps:
 * 1. Generate a Cypher statement from the question and the graph schema
 * 2. Execute the statement, exactly as generated, against the graph
 * 3. Ask the model to phrase an answer from the returned rows
 *
 * Nothing is retried or caught: a failure at any step reaches the caller
 * unchanged. The chain holds no per-question state, so concurrent calls
 * are independent.
 */
export class GraphQAChain<TResult = unknown> {
  readonly graph: GraphStore<TResult>;
  readonly cypherGenerationChain: CompletionChain;
  readonly qaChain: CompletionChain;
  readonly inputKey: string;
  readonly outputKey: string;
  readonly observer: GraphQAObserver;

  constructor(fields: GraphQAChainInput<TResult>) {
    this.graph = fields.graph;
    this.cypherGenerationChain = fields.cypherGenerationChain;
    this.qaChain = fields.qaChain;
    this.observer = fields.observer ?? noopObserver;
    this.inputKey = fields.inputKey ?? 'query';
    this.outputKey = fields.outputKey ?? 'result';
  }

  /**
   * Build both completion steps from a single language model.
   */
  static fromLLM<TResult>(
    llm: LanguageModelLike,
    { cypherPrompt = CYPHER_GENERATION_PROMPT, qaPrompt = CYPHER_QA_PROMPT, ...rest }: GraphQAFromLLMOptions<TResult>
  ): GraphQAChain<TResult> {
    return new GraphQAChain({
      ...rest,
      cypherGenerationChain: new PromptChain({ llm, prompt: cypherPrompt }),
      qaChain: new PromptChain({ llm, prompt: qaPrompt }),
    });
  }

  get inputKeys(): string[] {
    return [this.inputKey];
  }

  get outputKeys(): string[] {
    return [this.outputKey];
  }

  /**
   * Generate a Cypher statement, run it and answer the question from the
   * results.
   *
   * @param question Natural language question about the graph
   * @returns The answer-synthesis step's output
   */
  async answer(question: string): Promise<string> {
    const schema = this.graph.getSchema();

    const generated = await this.cypherGenerationChain.run({ question, schema });
    const generatedQuery = outputOf(generated, this.cypherGenerationChain.outputKey);
    this.notify(observer => observer.onGeneratedQuery(generatedQuery));

    const result = await this.graph.query(generatedQuery);
    const context = contextToText(result);
    this.notify(observer => observer.onContext(context));

    const synthesis = await this.qaChain.run({ question, context });
    return outputOf(synthesis, this.qaChain.outputKey);
  }

  /**
   * Chain-style entry point: reads the question from `inputKey` and returns
   * the answer under `outputKey`.
   */
  async invoke(values: Record<string, unknown>): Promise<Record<string, string>> {
    const question = values[this.inputKey];
    if (typeof question !== 'string') {
      throw new Error(`Missing string input "${this.inputKey}"`);
    }
    return { [this.outputKey]: await this.answer(question) };
  }

  private notify(event: (observer: GraphQAObserver) => void): void {
    try {
      event(this.observer);
    } catch (error) {
      console.error('Graph QA observer failed:', error);
    }
  }
}
