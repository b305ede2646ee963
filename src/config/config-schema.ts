/**
 * Zod schemas for configuration validation
 *
 * The schemas are the single source of the configuration types: every type
 * below is inferred from them.
 */

import { z } from 'zod';
import { NotificationLevelSchema } from '../notifications/notification-level.js';
import { SiteTypeSchema } from '../sites/site-type.js';
import { FailurePolicySchema, RunModeSchema } from '../types/run-mode.js';

/**
 * How downloads are run and where they go
 */
export const DownloadSettingsSchema = z
  .object({
    destinationRoot: z.string().min(1).optional().describe('Root folder courses are written to'),
    mode: RunModeSchema.optional().describe('One subprocess per item, or one for the whole playlist'),
    failurePolicy: FailurePolicySchema.optional().describe('Continue with the next item or abort after a failure'),
    graceMs: z.number().int().nonnegative().optional().describe('Wait after SIGTERM before SIGKILL, in milliseconds'),
    retries: z.number().int().nonnegative().optional().describe('Retries per download'),
    fragmentRetries: z.number().int().nonnegative().optional().describe('Retries per fragment'),
    concurrentFragments: z.number().int().positive().optional().describe('Fragments fetched in parallel'),
    ledgerFile: z.string().min(1).optional().describe('Ledger file name, relative to the destination root'),
    nativeArchiveFile: z
      .string()
      .min(1)
      .nullable()
      .optional()
      .describe('Archive file handed to the tool, relative to the destination root; null disables it'),
    userAgent: z.string().min(1).nullable().optional().describe('User-Agent header sent by the tool'),
    extraArgs: z.array(z.string()).optional().describe('Extra arguments passed to the tool as-is'),
  })
  .strict();

export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;

/**
 * Subtitle preferences
 */
export const SubtitleSettingsSchema = z
  .object({
    enabled: z.boolean().optional().describe('Download subtitles as separate files'),
    languages: z.array(z.string().min(1)).optional().describe('Subtitle languages; empty means all'),
    format: z.string().min(1).optional().describe('Preferred subtitle format'),
  })
  .strict();

export type SubtitleSettings = z.infer<typeof SubtitleSettingsSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z
  .object({
    ytdlpPath: z.string().min(1).optional().describe('Path to the yt-dlp executable'),
    cookieFile: z.string().min(1).optional().describe('Cookie file in Netscape format'),
    siteType: SiteTypeSchema.optional().describe('Site hint; auto detects from the URL'),
    download: DownloadSettingsSchema.optional(),
    subtitles: SubtitleSettingsSchema.optional(),
    notifications: z
      .object({
        consoleMinLevel: NotificationLevelSchema.optional().describe('Minimum level printed to the console'),
      })
      .strict()
      .optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate a parsed configuration document
 *
 * @returns Object with { success: true, config } or { success: false, error }
 */
export function validateConfigSafe(raw: unknown): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

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
