import { join } from 'node:path';
import { boolean, command, flag, oneOf, option, optional, positional, string } from 'cmd-ts';
import { ArchiveLedger } from './archive/archive-ledger.js';
import { loadConfig } from './config/config-loader.js';
import { resolveConfig } from './config/config-resolver.js';
import type { Config } from './config/config-schema.js';
import type { ResolvedConfig } from './config/resolved-config.types.js';
import { JobRunner } from './downloader/job-runner.js';
import { ConfigError, ProcessLaunchError, ValidationError, errorMessage } from './errors/custom-errors.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import { NotificationLevel } from './notifications/notification-level.js';
import type { Notifier } from './notifications/notifier.js';
import { ProgressRenderer } from './notifications/progress-renderer.js';
import { SessionController } from './session/session-controller.js';
import { type SiteType, SiteTypeValues } from './sites/site-type.js';
import { type FailurePolicy, FailurePolicyValues, type RunMode, RunModeValues } from './types/run-mode.js';
import type { SessionOutcome } from './types/session.types.js';
import { LogLevel, logger } from './utils/logger.js';

export type CliOptions = {
  url: string;
  dest?: string;
  cookies?: string;
  site?: SiteType;
  /** Comma-separated language codes */
  subLangs?: string;
  mode?: RunMode;
  onFailure?: FailurePolicy;
  config?: string;
  clearArchive: boolean;
  verbose: boolean;
};

/**
 * The part of the session controller the CLI drives
 */
export type SessionHandle = Pick<SessionController, 'start' | 'cancel' | 'subscribe'>;

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  checkInstalled: (binary: string) => Promise<string>;
  createController: (config: ResolvedConfig, ledger: ArchiveLedger) => SessionHandle;
  createNotifier: (minLevel: NotificationLevel) => Notifier;
  /** Register a signal handler; returns a function that removes it */
  onSignal: (signal: NodeJS.Signals, handler: () => void) => () => void;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  checkInstalled: (binary) => JobRunner.checkInstalled(binary),
  createController: (config, ledger) => new SessionController(config, { ledger }),
  createNotifier: (minLevel) => new ConsoleNotifier(minLevel),
  onSignal: (signal, handler) => {
    process.on(signal, handler);
    return () => {
      process.off(signal, handler);
    };
  },
};

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  cancelled: 130,
} as const satisfies Record<SessionOutcome, number>;

/**
 * Split a comma-separated language list; an empty list means no preference
 */
export function parseLanguages(value: string | undefined): string[] | undefined {
  const languages = (value ?? '')
    .split(',')
    .map((lang) => lang.trim())
    .filter(Boolean);
  return languages.length > 0 ? languages : undefined;
}

/**
 * Command-line flags as the highest configuration layer
 */
export function toOverrides(options: CliOptions): Config {
  return {
    cookieFile: options.cookies,
    siteType: options.site,
    download: {
      destinationRoot: options.dest,
      mode: options.mode,
      failurePolicy: options.onFailure,
    },
  };
}

/**
 * Run one download session from parsed command-line options
 *
 * @returns Process exit code
 * @throws ConfigError, ProcessLaunchError
 */
export async function runApp(options: CliOptions, deps: AppDependencies = defaultDependencies): Promise<number> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const config = resolveConfig(await deps.loadConfig(options.config), toOverrides(options));

  logger.debug(`Checking ${config.ytdlpPath} installation...`);
  const version = await deps.checkInstalled(config.ytdlpPath);
  logger.debug(`yt-dlp ${version}`);

  const notifier = deps.createNotifier(options.verbose ? NotificationLevel.DEBUG : config.notifications.consoleMinLevel);
  const ledger = new ArchiveLedger();

  if (options.clearArchive) {
    const ledgerPath = join(config.download.destinationRoot, config.download.ledgerFile);
    ledger.load(ledgerPath);
    ledger.clear();
    notifier.notify(NotificationLevel.WARNING, `Download archive cleared: ${ledgerPath}`);
  }

  const controller = deps.createController(config, ledger);
  const renderer = new ProgressRenderer(notifier);
  const unsubscribe = controller.subscribe(renderer.render);

  const cancel = (): void => {
    controller.cancel();
  };
  const removeHandlers = [deps.onSignal('SIGINT', cancel), deps.onSignal('SIGTERM', cancel)];

  try {
    const summary = await controller.start({
      url: options.url,
      siteType: config.siteType,
      destinationRoot: config.download.destinationRoot,
      cookieFile: config.cookieFile,
      subtitleLanguages: parseLanguages(options.subLangs),
    });
    return EXIT_CODES[summary.outcome];
  } catch (error) {
    if (error instanceof ValidationError) {
      notifier.notify(NotificationLevel.ERROR, `Invalid ${error.field}: ${error.message}`);
      return EXIT_CODES.failed;
    }
    throw error;
  } finally {
    unsubscribe();
    for (const remove of removeHandlers) {
      remove();
    }
  }
}

/**
 * runApp with every error reported on the console
 *
 * @returns Process exit code
 */
export async function runCli(options: CliOptions, deps: AppDependencies = defaultDependencies): Promise<number> {
  try {
    return await runApp(options, deps);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else if (error instanceof ProcessLaunchError) {
      logger.error(
        `${error.message}. Install yt-dlp first:\n` +
          '  - macOS: brew install yt-dlp\n' +
          '  - Linux: pip install yt-dlp\n' +
          '  - Windows: winget install yt-dlp',
      );
    } else {
      logger.error(`Fatal error: ${errorMessage(error)}`);
    }
    return EXIT_CODES.failed;
  }
}

export const cli = command({
  name: 'coursegrab',
  description: 'Download whole courses, playlists and albums with yt-dlp',
  version: '0.1.0',
  args: {
    url: positional({ type: string, displayName: 'url', description: 'Course, playlist or video URL' }),
    dest: option({
      type: optional(string),
      long: 'dest',
      short: 'd',
      description: 'Destination root folder (default: ./downloads)',
    }),
    cookies: option({ type: optional(string), long: 'cookies', description: 'Cookie file in Netscape format' }),
    site: option({
      type: optional(oneOf(SiteTypeValues)),
      long: 'site',
      description: `Site type: ${SiteTypeValues.join(', ')} (default: auto)`,
    }),
    subLangs: option({
      type: optional(string),
      long: 'sub-langs',
      description: 'Subtitle languages, comma-separated (default: all)',
    }),
    mode: option({
      type: optional(oneOf(RunModeValues)),
      long: 'mode',
      description: 'per-item runs yt-dlp once per entry; playlist once for the whole URL (default: per-item)',
    }),
    onFailure: option({
      type: optional(oneOf(FailurePolicyValues)),
      long: 'on-failure',
      description: 'continue with the next item or abort the session (default: continue)',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to configuration file (default: ./coursegrab.yaml when present)',
    }),
    clearArchive: flag({
      type: boolean,
      long: 'clear-archive',
      description: 'Forget previously downloaded items before starting',
    }),
    verbose: flag({ type: boolean, long: 'verbose', short: 'v', description: 'Print debug output' }),
  },
  handler: async (args) => {
    process.exit(await runCli(args));
  },
});
