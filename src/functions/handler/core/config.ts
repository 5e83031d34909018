/**
 * Configuration loader for ASG Spot Advisor.
 *
 * Loads configuration from AWS Systems Manager (SSM) Parameter Store,
 * validates the structure, and provides caching for performance.
 * CLI flags are validated through the same schema.
 */

import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { AssumeRoleInRegion, Config, SpotUpdateSettings } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('asg-spot-advisor:config');

const RoleSchema = z.object({
  arn: z.string().min(1).optional(),
  external_id: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

// Unquoted YAML scalars such as `managed: true` or `tier: 1` are read as tag strings
const TagValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/**
 * Configuration schema validation using Zod.
 *
 * Only discovery and update have required content, and both fall back to defaults.
 */
const ConfigSchema = z.object({
  role: RoleSchema.optional(),
  event_bus: z
    .object({
      arn: z.string().min(1),
      role: RoleSchema.optional(),
    })
    .optional(),
  discovery: z
    .object({
      tags: z.record(TagValueSchema).default({}),
      describe_concurrency: z.number().int().min(1).max(20).default(1),
    })
    .default({}),
  update: z
    .object({
      on_demand_base_capacity: z.number().int().min(0).default(0),
      on_demand_percentage_above_base_capacity: z.number().int().min(0).max(100).default(0),
      spot_allocation_strategy: z
        .enum(['capacity-optimized', 'capacity-optimized-prioritized', 'lowest-price', 'price-capacity-optimized'])
        .default('capacity-optimized'),
    })
    .default({}),
});

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the SSM parameter is not found.
 */
export class ParameterNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParameterNotFoundError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * LRU cache for configuration objects.
 * Prevents unnecessary SSM API calls for the same parameter.
 */
const configCache = new LRUCache<string, Config>({
  max: 128,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Validates a raw configuration object and fills in defaults.
 *
 * @throws {ConfigValidationError} If any field is invalid
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigValidationError(
      `Configuration validation failed. Invalid fields: ${problems.join('; ')}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Loads configuration from an AWS SSM parameter.
 *
 * @param parameterName - The name of the SSM parameter
 * @param client - Optional SSM client for testing
 * @returns Parsed and validated configuration object
 *
 * @throws {ParameterNotFoundError} If the parameter is not found
 * @throws {ConfigError} If the configuration cannot be retrieved or parsed
 * @throws {ConfigValidationError} If fields are invalid
 */
export async function loadConfigFromSsm(parameterName: string, client?: SSMClient): Promise<Config> {
  // Check cache first
  const cached = configCache.get(parameterName);
  if (cached) {
    logger.debug(`Using cached config for parameter: ${parameterName}`);
    return cached;
  }

  logger.info(`Loading config from SSM: ${parameterName}`);

  const ssmClient = client ?? new SSMClient({});

  let parameterValue: string;
  try {
    const response = await ssmClient.send(new GetParameterCommand({ Name: parameterName }));
    parameterValue = response.Parameter?.Value ?? '';
  } catch (error) {
    // Type guard for AWS SDK errors
    if (error && typeof error === 'object' && 'name' in error && error.name === 'ParameterNotFound') {
      throw new ParameterNotFoundError(`Could not find SSM parameter: ${parameterName}`, {
        cause: error,
      });
    }
    throw new ConfigError(`Failed to retrieve SSM parameter: ${String(error)}`, { cause: error });
  }

  if (!parameterValue) {
    throw new ConfigError(`SSM parameter ${parameterName} exists but has no value`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(parameterValue);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML configuration from parameter ${parameterName}: ${String(error)}`,
      { cause: error }
    );
  }

  const config = parseConfig(raw);
  configCache.set(parameterName, config);

  logger.info('Config loaded successfully');
  return config;
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}

/**
 * Role used for Auto Scaling and STS calls.
 */
export function scanRole(config: Config): AssumeRoleInRegion {
  return {
    arn: config.role?.arn,
    externalId: config.role?.external_id,
    region: config.role?.region,
  };
}

/**
 * Role used for EventBridge calls. It is independent of the scan role.
 */
export function eventBusRole(config: Config): AssumeRoleInRegion {
  const role = config.event_bus?.role;
  return {
    arn: role?.arn,
    externalId: role?.external_id,
    region: role?.region,
  };
}

export function spotUpdateSettings(config: Config): SpotUpdateSettings {
  return {
    onDemandBaseCapacity: config.update.on_demand_base_capacity,
    onDemandPercentageAboveBaseCapacity: config.update.on_demand_percentage_above_base_capacity,
    spotAllocationStrategy: config.update.spot_allocation_strategy,
  };
}
