import { ChatGoogleGenerativeAI, type GoogleGenerativeAIChatInput } from '@langchain/google-genai';
import type { LLMConfig } from '../../lib/config';
import { Writer } from './writer';

/**
 * Build the language model selected by configuration.
 *
 * Gemini is the default provider; `writer` routes completions through the
 * Writer hosted API instead. Credentials come from the config as resolved
 * by `loadConfig`, never from the environment directly.
 */
export function createLanguageModel(config: LLMConfig): Writer | ChatGoogleGenerativeAI {
  switch (config.provider) {
    case 'writer':
      return new Writer({
        apiKey: config.apiKey,
        orgId: config.orgId,
        modelId: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature,
      });
    case 'google': {
      const fields: GoogleGenerativeAIChatInput = {
        model: config.model,
        temperature: config.temperature,
        apiKey: config.apiKey,
      };
      return new ChatGoogleGenerativeAI(fields);
    }
  }
}
