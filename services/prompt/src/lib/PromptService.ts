import { AppConfig, Logger, getLogger } from '@textshape/shared';
import { Extractor, ModelClient, OpenAIModelClient } from '@textshape/prompt';
import { EmailTask } from '../schemas/emailTask';
import {
  CustomerSentimentAnalysis,
  checkSentimentConsistency,
} from '../schemas/customerSentiment';
import { customerSentimentExtraction, emailTaskExtraction } from './extractions';

interface PromptServiceOptions {
  client: ModelClient;
  model: string;
  logger?: Logger;
}

export class PromptService {
  private extractor: Extractor;
  private logger: Logger;

  constructor(options: PromptServiceOptions) {
    this.logger = options.logger ?? getLogger('prompt-service');
    this.extractor = new Extractor(options.client, {
      model: options.model,
      logger: this.logger,
    });
  }

  /**
   * Turn an email into a task record: sender, requests, priority and deadline.
   */
  async parseEmailToTasks(emailContent: string): Promise<Readonly<EmailTask>> {
    return this.extractor.extract(emailTaskExtraction, emailContent);
  }

  /**
   * Score customer feedback and pick churn risk, follow-up and response template.
   * Inconsistent follow-up fields are logged, not rejected.
   */
  async analyzeCustomerSentiment(feedback: string): Promise<Readonly<CustomerSentimentAnalysis>> {
    const analysis = await this.extractor.extract(customerSentimentExtraction, feedback);

    for (const warning of checkSentimentConsistency(analysis)) {
      this.logger.warn(`Inconsistent sentiment analysis: ${warning}`);
    }

    return analysis;
  }
}

export function createPromptService(config: AppConfig): PromptService {
  const client = new OpenAIModelClient({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    timeoutMs: config.openai.timeoutMs,
  });
  return new PromptService({ client, model: config.openai.model });
}
