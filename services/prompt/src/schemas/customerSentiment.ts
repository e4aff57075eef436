import { z } from 'zod';

export const SENTIMENT_LEVELS = [
  'very_positive',
  'positive',
  'neutral',
  'negative',
  'very_negative',
] as const;

export const FEEDBACK_CATEGORIES = [
  'product',
  'service',
  'price',
  'support',
  'delivery',
  'overall',
] as const;

export const EMOTIONS = ['delighted', 'satisfied', 'neutral', 'frustrated', 'angry'] as const;
export const CHURN_RISKS = ['low', 'medium', 'high'] as const;
export const FOLLOWUP_PRIORITIES = ['urgent', 'high', 'medium', 'low'] as const;
export const RESPONSE_TEMPLATES = ['apology', 'thank_you', 'clarification', 'resolution'] as const;

export const SentimentLevelSchema = z.enum(SENTIMENT_LEVELS);

export const SentimentIndicatorSchema = z.object({
  phrase: z.string(),
  sentiment_impact: SentimentLevelSchema,
  category: z.enum(FEEDBACK_CATEGORIES),
});

export const CustomerSentimentAnalysisSchema = z.object({
  overall_sentiment: SentimentLevelSchema.describe('Overall customer sentiment'),
  sentiment_score: z
    .number()
    .min(-1)
    .max(1)
    .describe('Numerical sentiment score from -1.0 to 1.0'),
  key_sentiment_indicators: z
    .array(SentimentIndicatorSchema)
    .describe('Specific phrases and their sentiment impact'),
  positive_aspects: z.array(z.string()).describe('What the customer liked'),
  negative_aspects: z.array(z.string()).describe('What the customer disliked'),
  improvement_suggestions: z.array(z.string()).describe("Customer's suggestions for improvement"),
  emotion_detected: z.enum(EMOTIONS).describe('Primary emotion expressed'),
  churn_risk: z.enum(CHURN_RISKS).describe('Risk of losing this customer'),
  requires_followup: z.boolean().describe('Whether this feedback needs immediate attention'),
  followup_priority: z.enum(FOLLOWUP_PRIORITIES).describe('Priority level for follow-up'),
  recommended_actions: z
    .array(z.string())
    .describe('Specific actions to address this feedback'),
  response_template_type: z
    .enum(RESPONSE_TEMPLATES)
    .describe('Type of response template to use'),
  // Description is written in the summary's target language
  executive_summary_spanish: z
    .string()
    .describe(
      'Proporcione un resumen ejecutivo en español del feedback del cliente, incluyendo el ' +
        'sentimiento principal, riesgo de pérdida del cliente, y acciones recomendadas. ' +
        'Máximo 3 oraciones.'
    ),
});

export type SentimentLevel = z.infer<typeof SentimentLevelSchema>;
export type SentimentIndicator = z.infer<typeof SentimentIndicatorSchema>;
export type CustomerSentimentAnalysis = z.infer<typeof CustomerSentimentAnalysisSchema>;

/**
 * Soft correlations between the follow-up fields. A non-empty result does not
 * invalidate the record; it flags output worth a human look.
 */
export function checkSentimentConsistency(analysis: CustomerSentimentAnalysis): string[] {
  const warnings: string[] = [];

  if (
    analysis.requires_followup &&
    analysis.followup_priority === 'urgent' &&
    analysis.recommended_actions.length === 0
  ) {
    warnings.push('urgent follow-up requested without any recommended actions');
  }

  if (!analysis.requires_followup && analysis.followup_priority === 'urgent') {
    warnings.push('follow-up priority is urgent but no follow-up is required');
  }

  return warnings;
}
