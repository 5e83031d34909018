#!/usr/bin/env node
/**
 * ASG Spot Advisor CLI entry point.
 *
 * Results go to stdout as JSON; logs go through Pino. SIGINT/SIGTERM cancel the
 * running command.
 */

import { CommandRunner } from '@functions/handler/core/commands';
import { setupLogger } from '@shared/utils/logger';
import { buildProgram } from './program';

const logger = setupLogger('asg-spot-advisor:cli');

const controller = new AbortController();

for (const signalName of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signalName, () => {
    logger.info({ signal: signalName }, 'Received signal, canceling command');
    controller.abort(new Error(`Received ${signalName}`));
  });
}

const program = buildProgram({
  createRunner: (config) => CommandRunner.fromConfig(config),
  write: (text) => process.stdout.write(`${text}\n`),
  signal: controller.signal,
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ error }, 'Command failed');
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
