import { run } from 'cmd-ts';
import { cli } from './app.js';

/**
 * coursegrab - download whole courses, playlists and albums with yt-dlp
 */

export { ArchiveLedger } from './archive/archive-ledger.js';
export { loadConfig, parseConfig } from './config/config-loader.js';
export { resolveConfig } from './config/config-resolver.js';
export type { Config } from './config/config-schema.js';
export type { ResolvedConfig } from './config/resolved-config.types.js';
export { JobRunner } from './downloader/job-runner.js';
export { PlaylistEnumerator } from './downloader/playlist-enumerator.js';
export type { DownloadJob, ItemRunner, JobResult } from './downloader/types.js';
export * from './errors/custom-errors.js';
export { ConsoleNotifier, NotificationLevel, type Notifier, ProgressRenderer } from './notifications/index.js';
export { planPaths, planPlaylistTemplate, type PlannedPaths, type Section } from './paths/path-planner.js';
export { parseProgressLine } from './progress/progress-parser.js';
export { SessionController } from './session/session-controller.js';
export { type SiteProfile, SiteRegistry, siteRegistry } from './sites/site-registry.js';
export { SiteType } from './sites/site-type.js';
export type { ProgressEvent } from './types/progress-event.types.js';
export { ProgressKind } from './types/progress-kind.js';
export type { DownloadRequest, QueueItem } from './types/queue-item.types.js';
export { FailurePolicy, RunMode } from './types/run-mode.js';
export type {
  OverallProgressEvent,
  SessionOutcome,
  SessionState,
  SessionSummary,
} from './types/session.types.js';
export { SessionStatus } from './types/session.types.js';
export { sanitizeFilename } from './utils/filename-sanitizer.js';
export { Logger, LogLevel, logger } from './utils/logger.js';

/**
 * Parse command-line arguments and run the CLI
 */
export async function main(args: string[]): Promise<void> {
  await run(cli, args);
}
