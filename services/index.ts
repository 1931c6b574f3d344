/**
 * Services Module
 *
 * Main entry point: re-exports the AI and graph services together with the
 * configuration helpers they are built from.
 */

// AI Services
export * from './ai';

// Graph Services
export * from './graph';

// Configuration & errors
export { loadConfig, DEFAULT_GOOGLE_MODEL, DEFAULT_WRITER_MODEL } from '../lib/config';
export type { AppConfig, LLMConfig, Neo4jConfig } from '../lib/config';
export { ConfigurationError, WriterAPIError } from '../lib/errors';

/**
 * Usage example:
 *
 * ```typescript
 * import { createGraphQAService, loadConfig } from '../services';
 *
 * const service = await createGraphQAService(loadConfig());
 * try {
 *   const answer = await service.chain.answer('Who lives in Canada?');
 * } finally {
 *   await service.close();
 * }
 * ```
 */
