export { PromptService, createPromptService } from './lib/PromptService';
export { emailTaskExtraction, customerSentimentExtraction } from './lib/extractions';
export { formatEmailTask, formatSentimentAnalysis } from './lib/format';
export * from './schemas/emailTask';
export * from './schemas/customerSentiment';
