import { EmailTask } from '../schemas/emailTask';
import { CustomerSentimentAnalysis } from '../schemas/customerSentiment';

const numbered = (items: readonly string[]): string[] =>
  items.map((item, index) => `  ${index + 1}. ${item}`);

export function formatEmailTask(task: EmailTask): string[] {
  return [
    `Sender: ${task.sender}`,
    `Date: ${task.date}`,
    `Priority: ${task.priority}`,
    `Deadline: ${task.deadline ?? 'None'}`,
    '',
    'Action Items:',
    ...numbered(task.action_items),
    '',
    `Context: ${task.context}`,
  ];
}

/**
 * Human-readable report; only the first three key indicators are shown.
 */
export function formatSentimentAnalysis(analysis: CustomerSentimentAnalysis): string[] {
  return [
    `Overall Sentiment: ${analysis.overall_sentiment} (Score: ${analysis.sentiment_score.toFixed(2)})`,
    `Emotion Detected: ${analysis.emotion_detected}`,
    `Churn Risk: ${analysis.churn_risk}`,
    `Requires Follow-up: ${analysis.requires_followup ? 'Yes' : 'No'} (Priority: ${analysis.followup_priority})`,
    '',
    'Positive Aspects:',
    ...analysis.positive_aspects.map((aspect) => `  ✓ ${aspect}`),
    '',
    'Negative Aspects:',
    ...analysis.negative_aspects.map((aspect) => `  ✗ ${aspect}`),
    '',
    'Key Indicators:',
    ...analysis.key_sentiment_indicators
      .slice(0, 3)
      .map((indicator) => `  • "${indicator.phrase}" → ${indicator.sentiment_impact} (${indicator.category})`),
    '',
    'Recommended Actions:',
    ...numbered(analysis.recommended_actions),
    '',
    `Response Type: ${analysis.response_template_type}`,
    '',
    'Executive Summary (Spanish):',
    `  ${analysis.executive_summary_spanish}`,
  ];
}
