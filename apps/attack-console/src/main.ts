import 'dotenv/config';
import { createConsoleLogger } from '@evsim/adapters';
import { InvalidParameterError, describeError } from '@evsim/domain';
import { SimulatorApiClient } from './api-client.js';
import { USAGE, parseArgs, runCommand } from './commands.js';

/**
 * Attack console: runs a session locally, or drives one on the API.
 *
 * Env vars:
 *   API_BASE_URL  — Base URL of the simulator API (default: http://localhost:3001)
 *   LOG_LEVEL     — debug | info | warn | error | silent (default: info)
 */

const API_BASE_URL = process.env['API_BASE_URL'] ?? 'http://localhost:3001';

async function main(argv: readonly string[]): Promise<void> {
  const command = parseArgs(argv);
  const output = await runCommand(command, {
    client: new SimulatorApiClient(API_BASE_URL),
    logger: createConsoleLogger('console'),
  });
  console.log(JSON.stringify(output, null, 2));
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`[console] ${describeError(err)}`);
  if (err instanceof InvalidParameterError) {
    for (const detail of err.details) console.error(`  ${detail}`);
    console.error(USAGE);
  }
  process.exitCode = 1;
});
