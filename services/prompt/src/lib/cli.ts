import { readFile } from 'fs/promises';
import { configureLogger, loadConfig, logger } from '@textshape/shared';
import { isExtractionError } from '@textshape/prompt';
import { PromptService, createPromptService } from './PromptService';

/**
 * Text to analyze: the file named by the first argument, or the embedded sample.
 */
export async function readInput(sample: string, args: string[] = process.argv.slice(2)): Promise<string> {
  const [inputPath] = args;
  return inputPath ? readFile(inputPath, 'utf8') : sample;
}

export function bootstrap(): PromptService {
  const config = loadConfig();
  configureLogger({ level: config.logLevel, file: config.logFile });
  return createPromptService(config);
}

/**
 * Prints the lines `main` resolves with to stdout. Any failure is logged and
 * turns into exit code 1.
 */
export function runScript(name: string, main: () => Promise<string[]>): Promise<void> {
  return main().then(
    (lines) => {
      console.log(lines.join('\n'));
    },
    (error: unknown) => {
      logger.error(`[${name}] ${error instanceof Error ? error.message : String(error)}`, {
        ...(isExtractionError(error) && { code: error.code }),
      });
      process.exitCode = 1;
    }
  );
}
