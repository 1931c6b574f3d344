import type { AppConfig } from '../../lib/config';
import { createLanguageModel } from '../ai/models';
import { Neo4jGraphStore } from './client';
import { ConsoleGraphQAObserver } from './observer';
import { GraphQAChain } from './qaChain';
import type { GraphRecord } from './types';

export interface GraphQAService {
  chain: GraphQAChain<GraphRecord[]>;
  store: Neo4jGraphStore;
  close(): Promise<void>;
}

/**
 * Connect to Neo4j and build a QA chain on the configured language model.
 * The caller owns the returned service and must `close()` it.
 */
export async function createGraphQAService(config: AppConfig): Promise<GraphQAService> {
  const llm = createLanguageModel(config.llm);
  const store = await Neo4jGraphStore.initialize(config.neo4j);

  const chain = GraphQAChain.fromLLM(llm, {
    graph: store,
    observer: config.verbose ? new ConsoleGraphQAObserver() : undefined,
  });

  return {
    chain,
    store,
    close: () => store.close(),
  };
}
