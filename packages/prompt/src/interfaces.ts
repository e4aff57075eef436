import type { ZodTypeAny } from 'zod';

// Define interfaces for the model-calling collaborator
export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export interface StructuredCompletionRequest {
  model: string;
  messages: ChatMessage[];
  /** Name the schema is registered under on the wire (`^[a-zA-Z0-9_-]+$`). */
  schemaName: string;
  schema: ZodTypeAny;
  temperature: number;
  maxOutputTokens?: number;
}

/**
 * Anything that can turn a system+user message pair and a target schema into a
 * decoded JSON payload.
 *
 * Implementations reject with CollaboratorUnavailableError for transport, auth or
 * quota failures, and with SchemaViolationError when the model produces nothing
 * that decodes as JSON. The payload itself is validated by the caller.
 */
export interface ModelClient {
  complete(request: StructuredCompletionRequest): Promise<unknown>;
}
