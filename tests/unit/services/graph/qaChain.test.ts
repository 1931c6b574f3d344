import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { PromptTemplate } from '@langchain/core/prompts';
import { GraphQAChain, contextToText } from '@/services/graph/qaChain';
import { KUZU_GENERATION_PROMPT } from '@/services/graph/prompts';
import type { CompletionChain } from '@/services/graph/promptChain';
import type { GraphQAObserver } from '@/services/graph/observer';
import type { GraphRecord, GraphStore } from '@/services/graph/types';

const SCHEMA = 'Node properties are the following:\nPerson {name: String}';
const CYPHER = 'MATCH (p:Person) RETURN p.name AS name';

function fakeChain(outputKey: string, output: string) {
  return {
    outputKey,
    run: jest.fn<CompletionChain['run']>().mockResolvedValue({ [outputKey]: output }),
  };
}

function fakeGraph(rows: GraphRecord[] = [{ name: 'Alice' }]) {
  return {
    getSchema: jest.fn<() => string>().mockReturnValue(SCHEMA),
    query: jest.fn<(statement: string) => Promise<GraphRecord[]>>().mockResolvedValue(rows),
  } satisfies GraphStore<GraphRecord[]>;
}

function setup(generated = CYPHER) {
  const graph = fakeGraph();
  const cypherGenerationChain = fakeChain('text', generated);
  const qaChain = fakeChain('text', 'Alice is a person in the graph.');
  const chain = new GraphQAChain({ graph, cypherGenerationChain, qaChain });
  return { graph, cypherGenerationChain, qaChain, chain };
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('GraphQAChain.answer', () => {
  it('passes exactly the question and schema to query generation', async () => {
    const { chain, cypherGenerationChain } = setup();

    await chain.answer('Who is in the graph?');

    expect(cypherGenerationChain.run).toHaveBeenCalledTimes(1);
    expect(cypherGenerationChain.run).toHaveBeenCalledWith({ question: 'Who is in the graph?', schema: SCHEMA });
  });

  it('executes the generated statement verbatim', async () => {
    const generated = '  MATCH (n) RETURN n\n';
    const { chain, graph } = setup(generated);

    await chain.answer('Show everything');

    expect(graph.query).toHaveBeenCalledWith(generated);
  });

  it('passes exactly the question and stringified rows to answer synthesis', async () => {
    const { chain, qaChain } = setup();

    const answer = await chain.answer('Who is in the graph?');

    expect(qaChain.run).toHaveBeenCalledWith({ question: 'Who is in the graph?', context: '[{"name":"Alice"}]' });
    expect(answer).toBe('Alice is a person in the graph.');
  });

  it('reads the schema again on every question', async () => {
    const { chain, graph } = setup();

    await chain.answer('first');
    await chain.answer('second');

    expect(graph.getSchema).toHaveBeenCalledTimes(2);
  });

  it('returns the designated output field of the synthesis step', async () => {
    const graph = fakeGraph();
    const chain = new GraphQAChain({
      graph,
      cypherGenerationChain: fakeChain('cypher', CYPHER),
      qaChain: {
        outputKey: 'answer',
        run: jest.fn<CompletionChain['run']>().mockResolvedValue({ answer: 'Alice', text: 'ignored' }),
      },
    });

    await expect(chain.answer('Who?')).resolves.toBe('Alice');
    expect(graph.query).toHaveBeenCalledWith(CYPHER);
  });

  it('propagates graph errors unchanged and skips synthesis', async () => {
    const { chain, graph, qaChain } = setup();
    const failure = new Error('Neo.ClientError.Statement.SyntaxError');
    graph.query.mockRejectedValue(failure);

    await expect(chain.answer('Who?')).rejects.toBe(failure);
    expect(qaChain.run).not.toHaveBeenCalled();
  });

  it('propagates generation errors before touching the graph', async () => {
    const { chain, graph, cypherGenerationChain } = setup();
    const failure = new Error('quota exceeded');
    cypherGenerationChain.run.mockRejectedValue(failure);

    await expect(chain.answer('Who?')).rejects.toBe(failure);
    expect(graph.query).not.toHaveBeenCalled();
  });

  it('fails when a step returns no value under its output key', async () => {
    const graph = fakeGraph();
    const chain = new GraphQAChain({
      graph,
      cypherGenerationChain: {
        outputKey: 'text',
        run: jest.fn<CompletionChain['run']>().mockResolvedValue({ cypher: CYPHER }),
      },
      qaChain: fakeChain('text', 'unused'),
    });

    await expect(chain.answer('Who?')).rejects.toThrow('Completion chain returned no "text" output');
    expect(graph.query).not.toHaveBeenCalled();
  });
});

describe('GraphQAChain observer', () => {
  it('reports the generated query and the full context', async () => {
    const observer = {
      onGeneratedQuery: jest.fn<GraphQAObserver['onGeneratedQuery']>(),
      onContext: jest.fn<GraphQAObserver['onContext']>(),
    };
    const { graph, cypherGenerationChain, qaChain } = setup();
    const chain = new GraphQAChain({ graph, cypherGenerationChain, qaChain, observer });

    await chain.answer('Who?');

    expect(observer.onGeneratedQuery).toHaveBeenCalledWith(CYPHER);
    expect(observer.onContext).toHaveBeenCalledWith('[{"name":"Alice"}]');
  });

  it('does not let a failing observer change the answer', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const observer: GraphQAObserver = {
      onGeneratedQuery: () => {
        throw new Error('observer broke');
      },
      onContext: () => undefined,
    };
    const { graph, cypherGenerationChain, qaChain } = setup();
    const chain = new GraphQAChain({ graph, cypherGenerationChain, qaChain, observer });

    await expect(chain.answer('Who?')).resolves.toBe('Alice is a person in the graph.');
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe('GraphQAChain.invoke', () => {
  it('maps the input key to the output key', async () => {
    const { chain } = setup();

    await expect(chain.invoke({ query: 'Who?' })).resolves.toEqual({ result: 'Alice is a person in the graph.' });
    expect(chain.inputKeys).toEqual(['query']);
    expect(chain.outputKeys).toEqual(['result']);
  });

  it('honours custom keys', async () => {
    const { graph, cypherGenerationChain, qaChain } = setup();
    const chain = new GraphQAChain({ graph, cypherGenerationChain, qaChain, inputKey: 'question', outputKey: 'answer' });

    await expect(chain.invoke({ question: 'Who?' })).resolves.toEqual({ answer: 'Alice is a person in the graph.' });
  });

  it('rejects a missing question', async () => {
    const { chain, graph } = setup();

    await expect(chain.invoke({ question: 'Who?' })).rejects.toThrow('Missing string input "query"');
    expect(graph.getSchema).not.toHaveBeenCalled();
  });
});

describe('GraphQAChain.fromLLM', () => {
  it('runs generation and synthesis through the model', async () => {
    const llm = new FakeListChatModel({
      responses: ['MATCH (n) RETURN count(n) AS count', 'There are 3 nodes.'],
    });
    const graph = fakeGraph([{ count: 3 }]);
    const chain = GraphQAChain.fromLLM(llm, { graph });

    const answer = await chain.answer('How many nodes are there?');

    expect(graph.query).toHaveBeenCalledWith('MATCH (n) RETURN count(n) AS count');
    expect(answer).toBe('There are 3 nodes.');
  });

  it('accepts custom prompts', async () => {
    const llm = new FakeListChatModel({ responses: ['MATCH (n) RETURN n', 'Nothing found.'] });
    const graph = fakeGraph([]);
    const chain = GraphQAChain.fromLLM(llm, {
      graph,
      cypherPrompt: PromptTemplate.fromTemplate('{schema}\n{question}'),
      qaPrompt: PromptTemplate.fromTemplate('{context}\n{question}'),
    });

    await expect(chain.answer('Anything?')).resolves.toBe('Nothing found.');
    expect(graph.query).toHaveBeenCalledWith('MATCH (n) RETURN n');
  });

  it('generates with the Kùzu dialect prompt', async () => {
    const llm = new FakeListChatModel({ responses: ['MATCH (p:Person)-[:KNOWS]->(f) RETURN f.name', 'Bob.'] });
    const graph = fakeGraph([{ 'f.name': 'Bob' }]);
    const chain = GraphQAChain.fromLLM(llm, { graph, cypherPrompt: KUZU_GENERATION_PROMPT });

    await expect(chain.answer('Who does Alice know?')).resolves.toBe('Bob.');
    expect(graph.query).toHaveBeenCalledWith('MATCH (p:Person)-[:KNOWS]->(f) RETURN f.name');
  });
});

describe('contextToText', () => {
  it('keeps strings as they are', () => {
    expect(contextToText('3 rows')).toBe('3 rows');
  });

  it('serializes structured results as JSON', () => {
    expect(contextToText([{ name: 'Alice', age: 30 }])).toBe('[{"name":"Alice","age":30}]');
  });

  it('falls back to String for values JSON cannot represent', () => {
    expect(contextToText(undefined)).toBe('undefined');
  });

  it('writes bigints as decimal strings', () => {
    expect(contextToText([{ n: BigInt(1) }])).toBe('[{"n":"1"}]');
  });

  it('falls back to String for circular results', () => {
    const row: Record<string, unknown> = { name: 'Alice' };
    row.self = row;

    expect(contextToText(row)).toBe('[object Object]');
  });
});
