export { Extractor } from './Extractor';
export type { ExtractorOptions } from './Extractor';
export { OpenAIModelClient } from './clients/OpenAIModelClient';
export type { ChatCompletionsAPI, OpenAIModelClientOptions } from './clients/OpenAIModelClient';
export {
  ExtractionError,
  EmptyInputError,
  SchemaViolationError,
  CollaboratorUnavailableError,
  isExtractionError,
} from './errors';
export type { ExtractionErrorCode } from './errors';

export * from './types';
