import { formatSentimentAnalysis } from '../lib/format';
import { bootstrap, readInput, runScript } from '../lib/cli';

const SAMPLE_FEEDBACK = `
I have ordered from you for almost four years and I have always recommended you to friends.
The coffee grinder itself is still excellent, no complaints there. But my last two orders
arrived a week late and nobody told me why. When I opened a support ticket it took five days
to get a reply, and the reply just pasted the tracking page I had already sent.

On top of that, shipping went up again this month. Paying more for slower delivery makes no sense.
Honestly, I'm seriously considering switching to your competitor, who offers free two-day shipping.

Please sort out your delivery partner and let support staff actually look into problems.
I would like to stay, but not like this.
`;

void runScript('analyze-sentiment', async () => {
  const feedback = await readInput(SAMPLE_FEEDBACK);
  const analysis = await bootstrap().analyzeCustomerSentiment(feedback);
  return formatSentimentAnalysis(analysis);
});
