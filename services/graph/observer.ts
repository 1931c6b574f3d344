/**
 * Receives progress from the graph QA chain. Purely diagnostic: the chain's
 * result never depends on what an observer does.
 */
export interface GraphQAObserver {
  onGeneratedQuery(query: string): void;
  onContext(context: string): void;
}

export const noopObserver: GraphQAObserver = {
  onGeneratedQuery: () => undefined,
  onContext: () => undefined,
};

/**
 * Prints the generated Cypher and the full query context to the console.
 */
export class ConsoleGraphQAObserver implements GraphQAObserver {
  onGeneratedQuery(query: string): void {
    console.log(`Generated Cypher:\n${query}`);
  }

  onContext(context: string): void {
    console.log(`Full Context:\n${context}`);
  }
}
