#!/usr/bin/env node
import { CLIParser } from './cli/CLIParser';
import {
  createApplication,
  startApplication,
  shutdownApplication,
  printStartupInfo,
} from './Application';

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  const app = createApplication(options.config);

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    shutdownApplication(app)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Error during shutdown:', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await startApplication(app);
  printStartupInfo(options.config, app);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
