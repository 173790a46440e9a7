/**
 * Zod schemas for configuration validation
 *
 * This file defines both the validation schemas AND the TypeScript types.
 * Types are automatically inferred from the schemas, ensuring they stay in sync.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/custom-errors.js';
import { LogLevelSchema } from '../utils/logger.js';

/**
 * Subscription names double as file and directory names
 */
export const SUBSCRIPTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const SubscriptionNameSchema = z
  .string()
  .regex(SUBSCRIPTION_NAME_PATTERN, {
    message: 'Must start with a letter or digit and contain only letters, digits, ".", "_" and "-"',
  })
  .describe('Subscription name');

const WorkerCountSchema = z.number().int().min(1).max(32);

/**
 * Daemon settings
 */
export const DaemonSettingsSchema = z.object({
  updateInterval: z.number().positive().optional().describe('Minutes between two update runs'),
});

/**
 * Player used by `play`
 */
export const PlayerSettingsSchema = z.object({
  command: z.string().min(1).optional().describe('Executable that receives the episode files as arguments'),
});

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  configDir: z.string().min(1).optional().describe('Directory holding subscriptions/ and hooks/'),
  indexDir: z.string().min(1).optional().describe('Directory holding one episode index per subscription'),
  contentDir: z.string().min(1).optional().describe('Parent directory of every subscription content directory'),
  filenameTemplate: z.string().min(1).optional().describe('Default filename template'),
  updateWorkers: WorkerCountSchema.optional().describe('Subscriptions updated concurrently'),
  downloadWorkers: WorkerCountSchema.optional().describe('Episodes downloaded concurrently per subscription'),
  ignore: z.array(z.string().min(1)).optional().describe('Wildcard patterns of subscriptions skipped in bulk'),
  contentTypes: z
    .record(z.string().min(1), z.string().regex(/^[A-Za-z0-9]+$/, { message: 'Must be a bare file extension' }))
    .optional()
    .describe('MIME type to file extension map, merged over the built-in one'),
  logLevel: LogLevelSchema.optional().describe('Minimum log level'),
  listLimit: z.number().int().positive().optional().describe('Default number of episodes shown by ls'),
  daemon: DaemonSettingsSchema.optional().describe('Daemon settings'),
  player: PlayerSettingsSchema.optional().describe('Player settings'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Subscription definition as stored in `<configDir>/subscriptions/<name>.yaml`.
 * The name is the file name and is not repeated inside the file.
 */
export const SubscriptionFileSchema = z.object({
  feedUrl: z.url({ protocol: /^https?$/ }).describe('Feed URL'),
  title: z.string().optional().describe('Display title'),
  contentDir: z.string().min(1).optional().describe('Content directory'),
  filenameTemplate: z.string().min(1).optional().describe('Filename template'),
  maxEpisodes: z.number().int().optional().describe('Retention count; 0 or absent keeps everything'),
  enabled: z.boolean().optional().describe('Whether updates include this subscription'),
});

export type SubscriptionFile = z.infer<typeof SubscriptionFileSchema>;

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.map(String).join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}

/**
 * Validate a value against a schema
 *
 * @param source - Where the value came from, used in the error message
 * @throws ConfigError if validation fails
 */
export function parseWithSchema<T extends z.ZodType>(schema: T, value: unknown, source: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatZodError(result.error)}`);
  }
  return result.data;
}
