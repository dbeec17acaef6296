#!/usr/bin/env node
/**
 * Request Wall - Main Entry Point
 */

import { parseArgs, printHelp, readStdin, runCheck, runServe } from './cli.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'help':
      printHelp();
      break;

    case 'check': {
      const body = args.text ?? (await readStdin());
      process.exitCode = runCheck(body);
      break;
    }

    case 'serve': {
      const server = await runServe(args);
      process.once('SIGINT', () => {
        server.stop().then(
          () => process.exit(0),
          (error: Error) => {
            console.error('Error stopping server:', error.message);
            process.exit(1);
          }
        );
      });
      break;
    }
  }
}

main().catch((error: Error) => {
  console.error('Error:', error.message);
  process.exit(1);
});
