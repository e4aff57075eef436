import { getLogger, Logger } from '@textshape/shared';
import { EmptyInputError, SchemaViolationError, isExtractionError } from './errors';
import { ChatMessage, ModelClient } from './interfaces';
import { ExtractionDefinition, ExtractionResult } from './types';

export interface ExtractorOptions {
  model: string;
  logger?: Logger;
}

const deepFreeze = <T>(value: T): Readonly<T> => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
};

/**
 * Runs one extraction call: instructions and input text go to the model client,
 * whatever comes back is validated against the definition's schema.
 *
 * Holds no per-call state, so a single instance can serve concurrent callers.
 * Nothing is retried here; retry policy belongs to the caller.
 */
export class Extractor {
  private client: ModelClient;
  private model: string;
  private logger: Logger;

  constructor(client: ModelClient, options: ExtractorOptions) {
    this.client = client;
    this.model = options.model;
    this.logger = options.logger ?? getLogger('extractor');
  }

  async extract<T>(definition: ExtractionDefinition<T>, input: string): Promise<Readonly<T>> {
    if (input.trim().length === 0) {
      this.logger.warn(`Rejected empty input for ${definition.name}`);
      throw new EmptyInputError(definition.name);
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: definition.instructions },
      { role: 'user', content: definition.userPrompt(input) },
    ];

    this.logger.debug(`Starting ${definition.name} extraction`, {
      model: this.model,
      inputLength: input.length,
    });
    const startTime = Date.now();

    let payload: unknown;
    try {
      payload = await this.client.complete({
        model: this.model,
        messages,
        schemaName: definition.name,
        schema: definition.schema,
        temperature: definition.temperature,
        maxOutputTokens: definition.maxOutputTokens,
      });
    } catch (error) {
      this.logger.warn(`${definition.name} extraction failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const parsed = definition.schema.safeParse(payload);
    if (!parsed.success) {
      const violation = SchemaViolationError.fromZodError(definition.name, parsed.error);
      this.logger.warn(`${definition.name} response rejected`, { issues: violation.issues });
      throw violation;
    }

    this.logger.debug(`${definition.name} extraction finished in ${Date.now() - startTime}ms`);
    return deepFreeze(parsed.data);
  }

  /**
   * Same as `extract`, but extraction failures come back as a result value
   * instead of a rejection. Anything that is not an ExtractionError still throws.
   */
  async safeExtract<T>(
    definition: ExtractionDefinition<T>,
    input: string
  ): Promise<ExtractionResult<T>> {
    try {
      return { success: true, data: await this.extract(definition, input) };
    } catch (error) {
      if (isExtractionError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }
}
