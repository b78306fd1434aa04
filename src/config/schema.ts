import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  dir: z.string().min(1),
  maxFiles: z.number().int().min(1).default(5),
  maxSize: z
    .string()
    .regex(/^\d+[bkmg]$/i, 'expected a size such as 512k or 10m')
    .default('10m'),
  console: z.boolean().default(false),
  file: z.boolean().default(true),
});

export const CommandPathsSchema = z.object({
  lsblk: z.string().min(1).default('lsblk'),
  pvs: z.string().min(1).default('pvs'),
  vgs: z.string().min(1).default('vgs'),
  lvs: z.string().min(1).default('lvs'),
  df: z.string().min(1).default('df'),
  parted: z.string().min(1).default('parted'),
});

export const CommandsConfigSchema = z.object({
  timeoutMs: z.number().int().min(100).max(600000).default(5000),
  probePartitions: z.boolean().default(true),
  paths: CommandPathsSchema,
});

export const UiConfigSchema = z.object({
  refreshIntervalMs: z
    .number()
    .int()
    .refine(value => value === 0 || value >= 1000, 'must be 0 (disabled) or at least 1000')
    .default(10000),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  commands: CommandsConfigSchema,
  ui: UiConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type CommandPaths = z.infer<typeof CommandPathsSchema>;
export type Tool = keyof CommandPaths;
