import { run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { logger } from './utils/logger.js';

/**
 * podkeep - podcast fetcher keeping a bounded local archive of subscribed feeds
 */

// Set up global error handlers
export function installErrorHandlers(): void {
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  await run(cli, argv);
}

installErrorHandlers();

// Run the application
main().catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
