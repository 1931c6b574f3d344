import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_GOOGLE_MODEL = 'gemini-2.0-flash-001';
export const DEFAULT_WRITER_MODEL = 'palmyra-instruct';
export const DEFAULT_GOOGLE_TEMPERATURE = 0;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const envSchema = z
  .object({
    NEO4J_URI: optionalString,
    NEO4J_USER: optionalString,
    NEO4J_PASSWORD: optionalString,
    NEO4J_DATABASE: optionalString,
    LLM_PROVIDER: z.enum(['google', 'writer']).default('google'),
    LLM_MODEL: optionalString,
    LLM_TEMPERATURE: optionalString.pipe(z.coerce.number().min(0).max(2).optional()),
    GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
    WRITER_API_KEY: optionalString,
    WRITER_ORG_ID: optionalString,
    WRITER_BASE_URL: optionalString.pipe(z.string().url().optional()),
    GRAPH_QA_VERBOSE: z
      .enum(['true', 'false', '1', '0'])
      .default('false')
      .transform(value => value === 'true' || value === '1'),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'google' && !env.GOOGLE_GENERATIVE_AI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_GENERATIVE_AI_API_KEY'],
        message: 'Required when LLM_PROVIDER is "google"',
      });
    }
    if (env.LLM_PROVIDER === 'writer') {
      for (const key of ['WRITER_API_KEY', 'WRITER_ORG_ID'] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'Required when LLM_PROVIDER is "writer"',
          });
        }
      }
    }
  });

export interface Neo4jConfig {
  url?: string;
  username?: string;
  password?: string;
  database?: string;
}

export type LLMConfig =
  | {
      provider: 'google';
      model: string;
      temperature: number;
      apiKey?: string;
    }
  | {
      provider: 'writer';
      model: string;
      /** Left unset so the Writer service applies its own default. */
      temperature?: number;
      apiKey?: string;
      orgId?: string;
      baseUrl?: string;
    };

export interface AppConfig {
  neo4j: Neo4jConfig;
  llm: LLMConfig;
  verbose: boolean;
}

/**
 * Build the application configuration from environment entries.
 *
 * Called once by whoever wires the services together; nothing else in the
 * package reads `process.env` on its own except credential fallbacks.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  const llm: LLMConfig =
    values.LLM_PROVIDER === 'writer'
      ? {
          provider: 'writer',
          model: values.LLM_MODEL ?? DEFAULT_WRITER_MODEL,
          temperature: values.LLM_TEMPERATURE,
          apiKey: values.WRITER_API_KEY,
          orgId: values.WRITER_ORG_ID,
          baseUrl: values.WRITER_BASE_URL,
        }
      : {
          provider: 'google',
          model: values.LLM_MODEL ?? DEFAULT_GOOGLE_MODEL,
          temperature: values.LLM_TEMPERATURE ?? DEFAULT_GOOGLE_TEMPERATURE,
          apiKey: values.GOOGLE_GENERATIVE_AI_API_KEY,
        };

  return Object.freeze({
    neo4j: {
      url: values.NEO4J_URI,
      username: values.NEO4J_USER,
      password: values.NEO4J_PASSWORD,
      database: values.NEO4J_DATABASE,
    },
    llm,
    verbose: values.GRAPH_QA_VERBOSE,
  });
}
