import neo4j from 'neo4j-driver';
import type { Neo4jConfig } from '../../lib/config';
import { ConfigurationError } from '../../lib/errors';
import type {
  GraphRecord,
  GraphStore,
  NodePropertyRow,
  RelationshipPatternRow,
  RelationshipPropertyRow,
} from './types';

/**
 * The parts of a neo4j-driver session the store uses.
 */
export interface Neo4jSessionLike {
  run(
    query: string,
    parameters?: Record<string, unknown>
  ): Promise<{ records: Array<{ toObject(): GraphRecord }> }>;
  close(): Promise<void>;
}

export interface Neo4jDriverLike {
  session(config: { defaultAccessMode: 'READ' | 'WRITE'; database?: string }): Neo4jSessionLike;
  close(): Promise<void>;
}

const NODE_PROPERTIES_QUERY = `
CALL db.schema.nodeTypeProperties()
YIELD nodeLabels, propertyName, propertyTypes
RETURN nodeLabels AS labels, propertyName AS property, propertyTypes AS types
`;

const RELATIONSHIP_PROPERTIES_QUERY = `
CALL db.schema.relTypeProperties()
YIELD relType, propertyName, propertyTypes
RETURN relType AS type, propertyName AS property, propertyTypes AS types
`;

const RELATIONSHIP_PATTERNS_QUERY = `
MATCH (a)-[r]->(b)
RETURN DISTINCT head(labels(a)) AS start, type(r) AS type, head(labels(b)) AS end
LIMIT 1000
`;

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

// relTypeProperties reports types as ":`KNOWS`"
function cleanRelationshipType(type: string): string {
  return type.replace(/^:/, '').replace(/`/g, '');
}

function formatProperties(entries: Map<string, string[]>): string[] {
  return Array.from(entries, ([name, properties]) => `${name} {${properties.join(', ')}}`);
}

/**
 * Render schema rows as the text handed to the query-generation prompt.
 */
export function formatSchema(
  nodeProperties: NodePropertyRow[],
  relationshipProperties: RelationshipPropertyRow[],
  relationships: RelationshipPatternRow[]
): string {
  const nodes = new Map<string, string[]>();
  for (const row of nodeProperties) {
    const label = row.labels.join(':');
    const properties = nodes.get(label) ?? [];
    if (row.property) {
      properties.push(`${row.property}: ${row.types.join('|')}`);
    }
    nodes.set(label, properties);
  }

  const rels = new Map<string, string[]>();
  for (const row of relationshipProperties) {
    const properties = rels.get(row.type) ?? [];
    if (row.property) {
      properties.push(`${row.property}: ${row.types.join('|')}`);
    }
    rels.set(row.type, properties);
  }

  return [
    'Node properties are the following:',
    ...formatProperties(nodes),
    'Relationship properties are the following:',
    ...formatProperties(rels),
    'The relationships are the following:',
    ...relationships.map(rel => `(:${rel.start})-[:${rel.type}]->(:${rel.end})`),
  ].join('\n');
}

/**
 * Neo4j graph store
 *
 * Executes Cypher statements in read sessions and keeps a textual schema
 * description for query generation. Call `refreshSchema()` (or use
 * `initialize`) before the first `getSchema()`.
 */
export class Neo4jGraphStore implements GraphStore<GraphRecord[]> {
  private driver: Neo4jDriverLike;
  private database?: string;
  private schema = '';

  constructor(driver: Neo4jDriverLike, options: { database?: string } = {}) {
    this.driver = driver;
    this.database = options.database;
  }

  /**
   * Connect with the given credentials and load the schema.
   */
  public static async initialize(config: Neo4jConfig): Promise<Neo4jGraphStore> {
    const { url, username, password } = config;
    if (!url || !username || !password) {
      throw new ConfigurationError('Missing Neo4j credentials: NEO4J_URI, NEO4J_USER and NEO4J_PASSWORD are required');
    }

    const driver = neo4j.driver(url, neo4j.auth.basic(username, password), {
      disableLosslessIntegers: true, // JS numbers instead of neo4j integers
      maxConnectionPoolSize: 50,
      connectionAcquisitionTimeout: 2000,
    });
    console.log('Neo4j driver initialized successfully');

    const store = new Neo4jGraphStore(driver, { database: config.database });
    try {
      await store.refreshSchema();
    } catch (error) {
      await store.close();
      throw error;
    }
    return store;
  }

  public getSchema(): string {
    return this.schema;
  }

  /**
   * Execute a Cypher statement and return each record as a plain object.
   * Errors from the driver propagate as-is.
   *
   * @param statement Cypher statement to execute
   * @param params Parameters for the statement
   */
  public async query(statement: string, params: Record<string, unknown> = {}): Promise<GraphRecord[]> {
    const session = this.driver.session({
      defaultAccessMode: neo4j.session.READ,
      database: this.database,
    });

    try {
      console.log('Executing Cypher query:', statement, 'with params:', params);
      const result = await session.run(statement, params);
      return result.records.map(record => record.toObject());
    } finally {
      await session.close();
    }
  }

  /**
   * Re-read node labels, relationship types and their properties.
   */
  public async refreshSchema(): Promise<void> {
    const nodeRows = await this.query(NODE_PROPERTIES_QUERY);
    const relPropertyRows = await this.query(RELATIONSHIP_PROPERTIES_QUERY);
    const patternRows = await this.query(RELATIONSHIP_PATTERNS_QUERY);

    this.schema = formatSchema(
      nodeRows.map(row => ({
        labels: asStringArray(row.labels),
        property: asString(row.property),
        types: asStringArray(row.types),
      })),
      relPropertyRows.map(row => ({
        type: cleanRelationshipType(asString(row.type) ?? ''),
        property: asString(row.property),
        types: asStringArray(row.types),
      })),
      patternRows.map(row => ({
        start: asString(row.start) ?? '',
        type: asString(row.type) ?? '',
        end: asString(row.end) ?? '',
      }))
    );
  }

  /**
   * Close the Neo4j driver connection
   */
  public async close(): Promise<void> {
    await this.driver.close();
  }
}
