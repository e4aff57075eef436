import { formatEmailTask, formatSentimentAnalysis } from '../../src/lib/format';
import { churningCustomer, happyCustomer, relaxedEmailTask, urgentEmailTask } from '../fixtures';

describe('formatEmailTask', () => {
  it('should print fields in a fixed order with numbered action items', () => {
    expect(formatEmailTask(urgentEmailTask)).toEqual([
      'Sender: priya.natarajan@example.com',
      'Date: Thursday, April 11, 2024',
      'Priority: high',
      'Deadline: Tomorrow (cost comparison)',
      '',
      'Action Items:',
      '  1. Review the draft service agreement and send comments to legal',
      '  2. Prepare a security questionnaire for the vendor IT team',
      '  3. Send the updated cost comparison to Priya',
      '',
      'Context: Next steps before signing with a new vendor.',
    ]);
  });

  it('should print None for a missing deadline', () => {
    expect(formatEmailTask(relaxedEmailTask)[3]).toBe('Deadline: None');
  });
});

describe('formatSentimentAnalysis', () => {
  it('should print the report with the first three indicators', () => {
    expect(formatSentimentAnalysis(churningCustomer)).toEqual([
      'Overall Sentiment: negative (Score: -0.60)',
      'Emotion Detected: frustrated',
      'Churn Risk: high',
      'Requires Follow-up: Yes (Priority: urgent)',
      '',
      'Positive Aspects:',
      '  ✓ Product quality',
      '',
      'Negative Aspects:',
      '  ✗ Late deliveries',
      '  ✗ Slow support',
      '',
      'Key Indicators:',
      '  • "arrived a week late" → negative (delivery)',
      '  • "took five days to get a reply" → very_negative (support)',
      '  • "grinder itself is still excellent" → positive (product)',
      '',
      'Recommended Actions:',
      '  1. Call the customer within 24 hours',
      '  2. Refund the shipping fees',
      '',
      'Response Type: apology',
      '',
      'Executive Summary (Spanish):',
      `  ${churningCustomer.executive_summary_spanish}`,
    ]);
  });

  it('should leave empty sections with only their heading', () => {
    const lines = formatSentimentAnalysis(happyCustomer);

    expect(lines[0]).toBe('Overall Sentiment: very_positive (Score: 0.90)');
    expect(lines[3]).toBe('Requires Follow-up: No (Priority: low)');
    const negativeHeading = lines.indexOf('Negative Aspects:');
    expect(lines[negativeHeading + 1]).toBe('');
    const actionsHeading = lines.indexOf('Recommended Actions:');
    expect(lines[actionsHeading + 1]).toBe('');
  });
});
