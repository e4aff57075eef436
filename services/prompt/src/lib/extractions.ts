import { ExtractionDefinition } from '@textshape/prompt';
import { EmailTask, EmailTaskSchema } from '../schemas/emailTask';
import {
  CustomerSentimentAnalysis,
  CustomerSentimentAnalysisSchema,
} from '../schemas/customerSentiment';
import {
  CUSTOMER_SENTIMENT_PROMPT,
  EMAIL_TASK_PROMPT,
  customerSentimentUserPrompt,
  emailTaskUserPrompt,
} from './prompts';

const TEMPERATURE = 0.3;

export const emailTaskExtraction: ExtractionDefinition<EmailTask> = {
  name: 'email_task',
  schema: EmailTaskSchema,
  instructions: EMAIL_TASK_PROMPT,
  userPrompt: emailTaskUserPrompt,
  temperature: TEMPERATURE,
  maxOutputTokens: 500,
};

export const customerSentimentExtraction: ExtractionDefinition<CustomerSentimentAnalysis> = {
  name: 'customer_sentiment_analysis',
  schema: CustomerSentimentAnalysisSchema,
  instructions: CUSTOMER_SENTIMENT_PROMPT,
  userPrompt: customerSentimentUserPrompt,
  temperature: TEMPERATURE,
};
