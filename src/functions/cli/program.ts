/**
 * Command-line interface definition.
 *
 * Flags are validated with the same schema as the SSM configuration, so both entry
 * points run commands against an identical Config.
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { CommandName, CommandResult, Config, TagFilter } from '@shared/types';
import { parseConfig } from '@functions/handler/core/config';

export const VERSION = '1.0.0';

export interface CommandExecutor {
  run(command: CommandName, tags: TagFilter, signal?: AbortSignal): Promise<CommandResult>;
}

export interface CliDependencies {
  createRunner: (config: Config) => CommandExecutor;
  write: (text: string) => void;
  signal?: AbortSignal;
}

const CliOptionsSchema = z.object({
  roleArn: z.string().optional(),
  externalId: z.string().optional(),
  region: z.string().optional(),
  tags: z.array(z.string()).default([]),
  concurrency: z.coerce.number().optional(),
  ebEventbusArn: z.string().optional(),
  ebRoleArn: z.string().optional(),
  ebExternalId: z.string().optional(),
  ebRegion: z.string().optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parses `key=value` items into a tag filter.
 *
 * Items may also be comma separated. Items without exactly one '=' are ignored.
 *
 * @example
 * parseTags(['env=prod,team=core', 'broken']) // { env: 'prod', team: 'core' }
 */
export function parseTags(list: readonly string[]): TagFilter {
  const tags: TagFilter = {};
  for (const item of list.flatMap((entry) => entry.split(','))) {
    const kv = item.split('=');
    if (kv.length === 2) {
      tags[kv[0]] = kv[1];
    }
  }
  return tags;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function toConfig(options: CliOptions): Config {
  return parseConfig({
    role: {
      arn: options.roleArn || undefined,
      external_id: options.externalId || undefined,
      region: options.region || undefined,
    },
    event_bus: options.ebEventbusArn
      ? {
          arn: options.ebEventbusArn,
          role: {
            arn: options.ebRoleArn || undefined,
            external_id: options.ebExternalId || undefined,
            region: options.ebRegion || undefined,
          },
        }
      : undefined,
    discovery: {
      tags: parseTags(options.tags),
      describe_concurrency: options.concurrency,
    },
  });
}

export function buildProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('asg-spot-advisor')
    .description('update/create MixedInstancesPolicy for Amazon EC2 Auto Scaling groups')
    .version(VERSION)
    .option('--role-arn <arn>', 'role ARN to assume')
    .option('--external-id <id>', 'external ID to assume role with')
    .option('--region <region>', 'the AWS Region to send the request to');

  const action = (name: CommandName) => async (_options: unknown, command: Command) => {
    const config = toConfig(CliOptionsSchema.parse(command.optsWithGlobals()));
    const result = await deps.createRunner(config).run(name, config.discovery.tags, deps.signal);
    deps.write(JSON.stringify(result, null, 2));
  };

  const withTagOptions = (command: Command): Command =>
    command
      .option('--tags <key=value>', 'tags to filter by (repeatable)', collect, [])
      .option('--concurrency <n>', 'describe batches fetched at the same time');

  const withEventBusOptions = (command: Command): Command =>
    command
      .option('--eb-eventbus-arn <arn>', 'send output to the specified Amazon EventBridge event bus')
      .option('--eb-role-arn <arn>', 'role ARN to assume for sending events to the event bus')
      .option('--eb-external-id <id>', 'external ID to assume the event bus role with')
      .option('--eb-region <region>', 'the AWS Region of the EventBridge event bus');

  withEventBusOptions(
    withTagOptions(program.command('list').description('list EC2 Auto Scaling groups, filtered by tags'))
  ).action(action('list'));

  withTagOptions(
    program.command('update').description('update EC2 Auto Scaling groups to maximize Spot usage')
  ).action(action('update'));

  withEventBusOptions(
    withTagOptions(
      program
        .command('recommend')
        .description('recommend optimization for EC2 Auto Scaling groups to maximize Spot usage')
    )
  ).action(action('recommend'));

  program
    .command('get-caller-identity')
    .description('get AWS caller identity')
    .action(action('get-caller-identity'));

  return program;
}
