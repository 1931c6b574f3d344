export { Writer, WRITER_API_BASE, resolveWriterCredentials, resolveWriterEndpoint } from './writer';
export type { WriterCallOptions, WriterCredentials, WriterFetch, WriterInput } from './writer';
export { mergeCompletionParams } from './params';
export type { WriterCompletionParams } from './params';
export { enforceStopTokens } from './stopTokens';
export { createLanguageModel } from './models';
