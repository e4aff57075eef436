import type { ZodType, ZodTypeDef } from 'zod';
import type { ExtractionError } from './errors';

// Re-export interfaces
export * from './interfaces';

export interface ExtractionDefinition<T> {
  name: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** System message: mapping rules from free text to the schema's fields. */
  instructions: string;
  userPrompt: (input: string) => string;
  temperature: number;
  maxOutputTokens?: number;
}

export type ExtractionResult<T> =
  | { success: true; data: Readonly<T> }
  | { success: false; error: ExtractionError };
