/**
 * CLI commands and argument parsing
 */

import { ApiServer } from './server/index.js';
import { createRequestValidator } from './validator/index.js';
import { DEFAULT_SERVER_CONFIG, type RequestValidator } from './types/index.js';

// ============================================
// CLI Arguments
// ============================================

export interface CliArgs {
  command: 'serve' | 'check' | 'help';
  port: number;
  host: string;
  rejectionStatus: number;
  bodyLimit: string | number;
  /** Text for `check`: every argument after it. Stdin is read when absent */
  text?: string;
}

function parseStatus(value: string | undefined): number {
  const status = Number(value);
  if (!Number.isInteger(status) || status < 400 || status > 599) {
    throw new Error(`--rejection-status expects an integer between 400 and 599, got: ${value ?? '(none)'}`);
  }
  return status;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: 'serve',
    port: DEFAULT_SERVER_CONFIG.port,
    host: DEFAULT_SERVER_CONFIG.host,
    rejectionStatus: DEFAULT_SERVER_CONFIG.rejectionStatus,
    bodyLimit: DEFAULT_SERVER_CONFIG.bodyLimit,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === 'check') {
      // Everything after `check` is the text, flags and command names included
      result.command = arg;
      const rest = args.slice(i + 1);
      if (rest.length > 0) {
        result.text = rest.join(' ');
      }
      break;
    } else if (arg === 'serve' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      result.port = parseInt(args[++i] ?? '') || DEFAULT_SERVER_CONFIG.port;
    } else if (arg === '--host') {
      result.host = args[++i] ?? DEFAULT_SERVER_CONFIG.host;
    } else if (arg === '--rejection-status') {
      result.rejectionStatus = parseStatus(args[++i]);
    } else if (arg === '--body-limit') {
      result.bodyLimit = args[++i] ?? result.bodyLimit;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    }
  }

  return result;
}

export function printHelp(): void {
  console.log(`
Request Wall - reject suspicious request bodies before they reach the app

Usage: request-wall [command] [options]

Commands:
  serve           Start the HTTP server (default)
  check [text...] Validate the remaining arguments (or stdin) and print the verdict
  help            Show this help message

Options:
  -p, --port <port>            Server port (default: ${DEFAULT_SERVER_CONFIG.port})
  --host <host>                Bind address (default: ${DEFAULT_SERVER_CONFIG.host})
  --rejection-status <code>    Status for rejected requests (default: ${DEFAULT_SERVER_CONFIG.rejectionStatus})
  --body-limit <size>          Maximum body size, e.g. 1mb (default: unlimited)
  -h, --help                   Show help

Examples:
  request-wall                              Serve POST /submit on port ${DEFAULT_SERVER_CONFIG.port}
  request-wall --rejection-status 400       Answer rejections with 400
  request-wall check '{"name": "John"}'     Print accept or reject <kind>
  cat body.json | request-wall check        Validate stdin
`);
}

// ============================================
// Commands
// ============================================

export async function readStdin(stream: AsyncIterable<Buffer | string> = process.stdin): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Print the verdict for one body. Exit code 0 on accept, 2 on reject.
 */
export function runCheck(body: string | Uint8Array, validator: RequestValidator = createRequestValidator()): number {
  const result = validator.validate(body);
  if (result.verdict === 'reject') {
    console.log(`reject ${result.kind}`);
    return 2;
  }
  console.log('accept');
  return 0;
}

export async function runServe(args: CliArgs): Promise<ApiServer> {
  const server = new ApiServer(createRequestValidator(), {
    port: args.port,
    host: args.host,
    rejectionStatus: args.rejectionStatus,
    bodyLimit: args.bodyLimit,
  });

  await server.start();
  console.log(`
Endpoints:
  POST /submit    - Validated submission

Rejected requests answer ${args.rejectionStatus}
Press Ctrl+C to stop
`);
  return server;
}
