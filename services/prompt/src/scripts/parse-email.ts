import { formatEmailTask } from '../lib/format';
import { bootstrap, readInput, runScript } from '../lib/cli';

const SAMPLE_EMAIL = `
From: priya.natarajan@example.com
Date: Thursday, April 11, 2024
Subject: Vendor onboarding - next steps

Hi all,

Thanks for the call this morning. A few things before we sign with the new vendor:

- Review the draft service agreement and send comments to legal by Friday
- Prepare a short security questionnaire for their IT team
- Send me the updated cost comparison (this is URGENT - finance needs it by tomorrow!)

Also, when you have a moment, please add the vendor contacts to the shared directory.

Best,
Priya
`;

void runScript('parse-email', async () => {
  const email = await readInput(SAMPLE_EMAIL);
  const task = await bootstrap().parseEmailToTasks(email);
  return formatEmailTask(task);
});
