import { StructuredCompletionRequest } from '@textshape/prompt';
import { EmailTask } from '../src/schemas/emailTask';
import { CustomerSentimentAnalysis } from '../src/schemas/customerSentiment';

export const urgentEmailTask: EmailTask = {
  sender: 'priya.natarajan@example.com',
  date: 'Thursday, April 11, 2024',
  action_items: [
    'Review the draft service agreement and send comments to legal',
    'Prepare a security questionnaire for the vendor IT team',
    'Send the updated cost comparison to Priya',
  ],
  priority: 'high',
  deadline: 'Tomorrow (cost comparison)',
  context: 'Next steps before signing with a new vendor.',
};

export const relaxedEmailTask: EmailTask = {
  sender: 'Tom',
  date: 'Monday, May 6, 2024',
  action_items: ['Update the team wiki page with the new build steps'],
  priority: 'low',
  deadline: null,
  context: 'Housekeeping request for the team wiki.',
};

export const churningCustomer: CustomerSentimentAnalysis = {
  overall_sentiment: 'negative',
  sentiment_score: -0.6,
  key_sentiment_indicators: [
    { phrase: 'arrived a week late', sentiment_impact: 'negative', category: 'delivery' },
    { phrase: 'took five days to get a reply', sentiment_impact: 'very_negative', category: 'support' },
    { phrase: 'grinder itself is still excellent', sentiment_impact: 'positive', category: 'product' },
    { phrase: 'shipping went up again', sentiment_impact: 'negative', category: 'price' },
  ],
  positive_aspects: ['Product quality'],
  negative_aspects: ['Late deliveries', 'Slow support'],
  improvement_suggestions: ['Change delivery partner'],
  emotion_detected: 'frustrated',
  churn_risk: 'high',
  requires_followup: true,
  followup_priority: 'urgent',
  recommended_actions: ['Call the customer within 24 hours', 'Refund the shipping fees'],
  response_template_type: 'apology',
  executive_summary_spanish:
    'Cliente de larga data frustrado por entregas tardías y soporte lento. Riesgo alto de pérdida. Se recomienda contacto inmediato y reembolso del envío.',
};

export const happyCustomer: CustomerSentimentAnalysis = {
  overall_sentiment: 'very_positive',
  sentiment_score: 0.9,
  key_sentiment_indicators: [
    { phrase: 'absolutely love it', sentiment_impact: 'very_positive', category: 'product' },
  ],
  positive_aspects: ['Easy setup', 'Fast delivery'],
  negative_aspects: [],
  improvement_suggestions: [],
  emotion_detected: 'delighted',
  churn_risk: 'low',
  requires_followup: false,
  followup_priority: 'low',
  recommended_actions: [],
  response_template_type: 'thank_you',
  executive_summary_spanish: 'Cliente encantado con el producto y la entrega. Sin riesgo de pérdida.',
};

/**
 * Deterministic stand-in for the model: always answers with the same payload
 * and records every request it receives.
 */
export class StubModelClient {
  readonly requests: StructuredCompletionRequest[] = [];

  constructor(private readonly payload: unknown) {}

  async complete(request: StructuredCompletionRequest): Promise<unknown> {
    this.requests.push(request);
    return structuredClone(this.payload);
  }
}
