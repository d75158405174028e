/**
 * Path formatting configuration
 */

import { z } from 'zod';
import { InvalidOptionsError } from '../common/exceptions.js';

/**
 * Path format configuration schema. Every step is enabled by default.
 */
export const PathFormatConfigSchema = z.object({
  /** Remove terminal escape sequences such as `\x1b[31m` */
  stripAnsi: z.boolean().default(true),
  /** Remove `* ? " < > |` */
  stripUnfriendlyChars: z.boolean().default(true),
  /** Resolve `.` and `..` segments without touching the filesystem */
  resolveParentDirs: z.boolean().default(true),
  /** `/home//user` becomes `/home/user` */
  collapseConsecutiveSlashes: z.boolean().default(true),
  /** Turn `\` into `/` */
  escapeBackslashes: z.boolean().default(true),
});

export type PathFormatConfig = z.infer<typeof PathFormatConfigSchema>;

/**
 * Create path format config with defaults
 */
export function createPathFormatConfig(config?: Partial<PathFormatConfig>): PathFormatConfig {
  const result = PathFormatConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    throw InvalidOptionsError.fromIssues('path format config', result.error.issues);
  }
  return result.data;
}
