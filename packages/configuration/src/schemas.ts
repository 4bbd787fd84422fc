/**
 * Standard configuration schemas shared by wlanctl components
 */

import { LOG_FORMATS, LOG_LEVELS } from '@wlanctl/logging';
import { z } from 'zod';

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('INFO'),
  /** Log file path (console-only when absent) */
  file: z.string().min(1).optional(),
  format: z.enum(LOG_FORMATS).default('text'),
  /** Rotation threshold, e.g. `10MB` */
  max_size: z
    .string()
    .regex(/^\d+(\.\d+)?\s*[KMG]?B$/i, 'Expected a size such as 512KB or 10MB')
    .default('10MB'),
  backup_count: z.number().int().min(1).default(3),
});

/**
 * An external program the daemon launches or calls
 */
export const ExecutableConfigSchema = z.object({
  binary: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ExecutableConfig = z.infer<typeof ExecutableConfigSchema>;
