import OpenAI from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import { getLogger, Logger } from '@textshape/shared';
import { CollaboratorUnavailableError, SchemaViolationError } from '../errors';
import { ModelClient, StructuredCompletionRequest } from '../interfaces';

/** The slice of the SDK this client calls. */
export interface ChatCompletionsAPI {
  create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
}

export interface OpenAIModelClientOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Injected in tests in place of `new OpenAI(...).chat.completions`. */
  completions?: ChatCompletionsAPI;
}

/**
 * ModelClient backed by OpenAI chat completions with strict JSON-schema
 * structured output.
 */
export class OpenAIModelClient implements ModelClient {
  private completions: ChatCompletionsAPI;
  private logger: Logger;

  constructor(options: OpenAIModelClientOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.logger = options.logger ?? getLogger('openai-client');
    this.completions =
      options.completions ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        maxRetries: 0, // failures surface to the caller as-is
      }).chat.completions;
  }

  async complete(request: StructuredCompletionRequest): Promise<unknown> {
    const { schemaName } = request;

    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.completions.create({
        model: request.model,
        messages: request.messages,
        response_format: zodResponseFormat(request.schema, schemaName),
        temperature: request.temperature,
        ...(request.maxOutputTokens !== undefined && {
          max_completion_tokens: request.maxOutputTokens,
        }),
      });
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new CollaboratorUnavailableError(`OpenAI request failed: ${error.message}`, {
          status: error.status,
          cause: error,
        });
      }
      throw error;
    }

    if (completion.usage) {
      this.logger.debug(`${schemaName} completion usage`, {
        model: completion.model,
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
      });
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new SchemaViolationError(schemaName, ['model returned no choices']);
    }
    if (choice.message.refusal) {
      throw new SchemaViolationError(schemaName, [`model refused: ${choice.message.refusal}`]);
    }
    if (choice.finish_reason === 'length') {
      throw new SchemaViolationError(schemaName, ['response was cut off at the output token limit']);
    }

    const content = choice.message.content;
    if (!content) {
      throw new SchemaViolationError(schemaName, ['model returned empty content']);
    }

    try {
      const payload: unknown = JSON.parse(content);
      return payload;
    } catch (error) {
      throw new SchemaViolationError(schemaName, ['response is not valid JSON'], { cause: error });
    }
  }
}
