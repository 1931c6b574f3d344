export { Neo4jGraphStore, formatSchema } from './client';
export type { Neo4jDriverLike, Neo4jSessionLike } from './client';
export { GraphQAChain, contextToText } from './qaChain';
export type { GraphQAChainInput, GraphQAFromLLMOptions } from './qaChain';
export { PromptChain } from './promptChain';
export type { CompletionChain, PromptChainInput } from './promptChain';
export { ConsoleGraphQAObserver, noopObserver } from './observer';
export type { GraphQAObserver } from './observer';
export {
  CYPHER_GENERATION_PROMPT,
  CYPHER_GENERATION_TEMPLATE,
  CYPHER_QA_PROMPT,
  CYPHER_QA_TEMPLATE,
  KUZU_GENERATION_PROMPT,
  KUZU_GENERATION_TEMPLATE,
} from './prompts';
export { createGraphQAService } from './setup';
export type { GraphQAService } from './setup';
export type { GraphRecord, GraphStore } from './types';

/**
 * Graph Service
 *
 * - Neo4jGraphStore: Neo4j connection, query execution and schema text
 * - GraphQAChain: question -> Cypher -> rows -> answer
 * - createGraphQAService: wires both from an AppConfig
 */
