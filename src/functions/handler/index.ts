/**
 * AWS Lambda handler for ASG Spot Advisor.
 *
 * Entry point for the Lambda function. Loads configuration, runs the requested
 * command, and returns responses.
 */

import type { Context } from 'aws-lambda';
import { z } from 'zod';
import { loadConfigFromSsm } from './core/config';
import { COMMAND_NAMES, CommandRunner, isCommandName } from './core/commands';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('asg-spot-advisor:main');

// Default SSM parameter name (can be overridden via environment variable)
const DEFAULT_CONFIG_PARAMETER = '/asg-spot-advisor/config';

// Time kept back from the invocation deadline to return a response
const DEADLINE_MARGIN_MS = 5000;

/**
 * Lambda event structure.
 */
export interface LambdaEvent {
  command?: string;
  tags?: unknown;
  [key: string]: unknown;
}

/**
 * Lambda response structure.
 */
export interface LambdaResponse {
  statusCode: number;
  body: string;
}

const EventTagsSchema = z.record(z.string());

function errorResponse(statusCode: number, message: string, requestId: string): LambdaResponse {
  return {
    statusCode,
    body: JSON.stringify({
      error: message,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    }),
  };
}

/**
 * Lambda handler function for ASG Spot Advisor.
 *
 * @param event - Lambda event with the command and optional tag filter
 * @param context - Lambda context object
 * @returns Lambda response with statusCode and JSON body
 *
 * @example
 * Event:
 * {
 *   "command": "recommend",
 *   "tags": { "spot-advisor:managed": "true" }
 * }
 *
 * Response:
 * {
 *   "statusCode": 200,
 *   "body": "{\"command\":\"recommend\",\"matched_count\":2,...}"
 * }
 */
export async function main(event: LambdaEvent, context: Context): Promise<LambdaResponse> {
  const requestId = context.awsRequestId || 'local-test';
  const functionName = context.functionName || 'asg-spot-advisor';

  const commandStr = event.command ?? 'list';

  logger.info({ command: commandStr, requestId, functionName }, 'Lambda invoked');

  if (!isCommandName(commandStr)) {
    logger.warn({ validCommands: COMMAND_NAMES }, `Invalid command: ${commandStr}`);
    return errorResponse(
      400,
      `Invalid command '${commandStr}'. Valid commands: ${COMMAND_NAMES.join(', ')}`,
      requestId
    );
  }

  const eventTags = EventTagsSchema.optional().safeParse(event.tags);
  if (!eventTags.success) {
    logger.warn({ tags: event.tags }, 'Invalid tags in event');
    return errorResponse(400, 'Invalid tags: expected an object of string values', requestId);
  }

  try {
    const configParameter = process.env.CONFIG_PARAMETER_NAME ?? DEFAULT_CONFIG_PARAMETER;
    const config = await loadConfigFromSsm(configParameter);
    const tags = eventTags.data ?? config.discovery.tags;

    const remaining = context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS;
    const signal = AbortSignal.timeout(Math.max(remaining, 0));

    const result = await CommandRunner.fromConfig(config).run(commandStr, tags, signal);

    logger.info({ command: commandStr, requestId }, 'Lambda execution completed successfully');

    return {
      statusCode: 200,
      body: JSON.stringify({
        ...result,
        timestamp: new Date().toISOString(),
        request_id: requestId,
      }),
    };
  } catch (error) {
    logger.error({ command: commandStr, error: String(error), requestId }, 'Lambda execution failed');
    return errorResponse(500, error instanceof Error ? error.message : String(error), requestId);
  }
}
