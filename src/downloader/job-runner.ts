import { existsSync } from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { join } from 'node:path';
import { execa } from 'execa';
import type { ResolvedDownloadSettings, ResolvedSubtitleSettings } from '../config/resolved-config.types.js';
import { errorMessage } from '../errors/custom-errors.js';
import { planPaths, planPlaylistTemplate } from '../paths/path-planner.js';
import { parseProgressLine } from '../progress/progress-parser.js';
import type { ProgressEvent } from '../types/progress-event.types.js';
import { createProgressEvent } from '../types/progress-event.types.js';
import { ProgressKind } from '../types/progress-kind.js';
import { RunMode } from '../types/run-mode.js';
import { logger } from '../utils/logger.js';
import { isLaunchFailure, isSubprocessFailure, toLaunchError } from './subprocess-errors.js';
import type { DownloadJob, ItemRunner, JobResult, ProgressListener } from './types.js';
import { buildYtdlpArgs, type SubtitleArgs } from './ytdlp-args.js';

export type JobRunnerOptions = {
  /** yt-dlp binary name or path */
  ytdlpPath: string;
  download: ResolvedDownloadSettings;
  subtitles: ResolvedSubtitleSettings;
};

/**
 * Running totals of one invocation
 */
type JobProgress = {
  /** Bytes of files the tool has moved past */
  finishedBytes: number;
  /** Last reported size of the file being written */
  currentBytes: number;
  filename: string | undefined;
  lastError: string | undefined;
  skipped: boolean;
  skipMessage: string | undefined;
  /** Data was written by this invocation: a new destination, partial progress or a merge */
  transferred: boolean;
  /** Position reported by the tool itself in single-invocation mode */
  toolIndex: number | null;
  toolCount: number | null;
};

/**
 * Drives one yt-dlp subprocess and turns its output into progress events
 */
export class JobRunner implements ItemRunner {
  constructor(private readonly options: JobRunnerOptions) {}

  /**
   * Check that the binary starts
   *
   * @returns Version string reported by the tool
   * @throws ProcessLaunchError if the binary is missing or not executable
   */
  static async checkInstalled(binary = 'yt-dlp'): Promise<string> {
    try {
      const { stdout } = await execa(binary, ['--version']);
      return String(stdout).trim();
    } catch (error) {
      if (isSubprocessFailure(error) && isLaunchFailure(error)) {
        throw toLaunchError(binary, error);
      }
      throw error;
    }
  }

  /**
   * Run one job to its end
   *
   * Item failures and cancellation are reported as events and in the result;
   * only a binary that cannot be started throws.
   *
   * @throws ProcessLaunchError
   */
  async run(job: DownloadJob, onEvent: ProgressListener, signal: AbortSignal): Promise<JobResult> {
    const { item } = job;
    const progress: JobProgress = {
      finishedBytes: 0,
      currentBytes: 0,
      filename: undefined,
      lastError: undefined,
      skipped: false,
      skipMessage: undefined,
      transferred: false,
      toolIndex: null,
      toolCount: null,
    };

    const emit = (event: ProgressEvent): void => {
      const index = item.isPlaylist ? (progress.toolIndex ?? event.itemIndex) : item.index;
      const count = item.isPlaylist ? (progress.toolCount ?? event.itemCount) : job.itemCount;
      try {
        onEvent({ ...event, itemIndex: index, itemCount: count });
      } catch (error) {
        logger.error(`Progress listener failed: ${errorMessage(error)}`);
      }
    };

    if (signal.aborted) {
      emit(createProgressEvent(ProgressKind.CANCELLED, { message: 'Cancelled before start' }));
      return { outcome: 'cancelled', totalBytes: 0 };
    }

    let args: string[];
    try {
      args = await this.prepareArgs(job);
    } catch (error) {
      const message = `Could not prepare output folder: ${errorMessage(error)}`;
      emit(createProgressEvent(ProgressKind.ITEM_FAILED, { message }));
      return { outcome: 'failed', totalBytes: 0, error: message };
    }

    const binary = this.options.ytdlpPath;
    logger.debug(`Running: ${binary} ${args.join(' ')}`);

    const subprocess = execa(binary, args, {
      all: true,
      buffer: false,
      stdin: 'ignore',
      cancelSignal: signal,
      forceKillAfterDelay: this.options.download.graceMs,
    });

    // Iteration stops early when the subprocess fails; the exit status below says why
    let streamError: unknown;
    try {
      for await (const line of subprocess.iterable({ from: 'all' })) {
        this.handleLine(line, job, progress, emit);
      }
    } catch (error) {
      streamError = error;
    }

    const totalBytes = (): number => progress.finishedBytes + progress.currentBytes;

    try {
      await subprocess;
    } catch (error) {
      if (signal.aborted || (isSubprocessFailure(error) && error.isCanceled === true)) {
        emit(createProgressEvent(ProgressKind.CANCELLED, { message: 'Cancelled' }));
        return { outcome: 'cancelled', totalBytes: totalBytes(), filename: progress.filename };
      }

      if (isSubprocessFailure(error) && isLaunchFailure(error)) {
        throw toLaunchError(binary, error);
      }

      const exitCode = isSubprocessFailure(error) ? error.exitCode : undefined;
      const message =
        progress.lastError ??
        (exitCode !== undefined ? `yt-dlp exited with code ${exitCode}` : `yt-dlp failed: ${errorMessage(error)}`);
      emit(createProgressEvent(ProgressKind.ITEM_FAILED, { message, filename: progress.filename }));
      return { outcome: 'failed', totalBytes: totalBytes(), error: message, filename: progress.filename };
    }

    if (streamError !== undefined) {
      const message = `Could not read yt-dlp output: ${errorMessage(streamError)}`;
      emit(createProgressEvent(ProgressKind.ITEM_FAILED, { message }));
      return { outcome: 'failed', totalBytes: totalBytes(), error: message, filename: progress.filename };
    }

    // A resumed item may skip one format and still fetch or merge the rest
    if (progress.skipped && !progress.transferred && !item.isPlaylist) {
      emit(
        createProgressEvent(ProgressKind.ITEM_SKIPPED, {
          percent: 100,
          message: progress.skipMessage,
          filename: progress.filename,
        }),
      );
      return { outcome: 'skipped', totalBytes: totalBytes(), filename: progress.filename };
    }

    emit(
      createProgressEvent(ProgressKind.ITEM_COMPLETE, {
        percent: 100,
        totalBytes: totalBytes(),
        filename: progress.filename,
      }),
    );
    return { outcome: 'completed', totalBytes: totalBytes(), filename: progress.filename };
  }

  private handleLine(line: string, job: DownloadJob, progress: JobProgress, emit: ProgressListener): void {
    logger.debug(`[yt-dlp] ${line}`);

    const event = parseProgressLine(line);
    if (!event) {
      return;
    }

    switch (event.kind) {
      case ProgressKind.STARTED:
        if (event.itemIndex !== null) {
          progress.toolIndex = event.itemIndex;
          progress.toolCount = event.itemCount;
        }
        if (event.filename) {
          progress.finishedBytes += progress.currentBytes;
          progress.currentBytes = 0;
          progress.filename = event.filename;
          progress.transferred = true;
        }
        break;
      case ProgressKind.DOWNLOADING:
        if (event.totalBytes !== null) {
          progress.currentBytes = event.totalBytes;
        }
        // The tool reports an existing file as a finished 100% line too
        if (event.percent === null || event.percent < 100) {
          progress.transferred = true;
        }
        break;
      case ProgressKind.POSTPROCESSING:
        if (event.filename) {
          progress.filename = event.filename;
          progress.transferred = true;
        }
        break;
      case ProgressKind.ITEM_SKIPPED:
        if (event.filename) {
          progress.filename = event.filename;
        }
        progress.skipped = true;
        // A single entry is reported skipped once, when the process exits
        if (!job.item.isPlaylist) {
          progress.skipMessage = event.message;
          return;
        }
        break;
      case ProgressKind.ITEM_FAILED:
        progress.lastError = event.message;
        // A single entry fails once, when the process exits
        if (!job.item.isPlaylist) {
          return;
        }
        break;
      default:
        break;
    }

    emit(event);
  }

  private async prepareArgs(job: DownloadJob): Promise<string[]> {
    const { request, item, profile, itemCount } = job;
    const { download, subtitles } = this.options;

    let outputTemplate: string;
    if (item.isPlaylist) {
      await fsPromises.mkdir(request.destinationRoot, { recursive: true });
      outputTemplate = planPlaylistTemplate(request.destinationRoot, profile.sectioned);
    } else {
      const planned = planPaths(request.destinationRoot, item.courseTitle, item.index, item.title ?? `item ${item.index}`, {
        section: profile.sectioned ? item.section : null,
        itemCount,
      });
      await fsPromises.mkdir(planned.directory, { recursive: true });
      outputTemplate = planned.videoPath;
    }

    let cookieFile: string | undefined;
    if (request.cookieFile) {
      if (existsSync(request.cookieFile)) {
        cookieFile = request.cookieFile;
      } else {
        logger.warning(`Cookie file not found, continuing without it: ${request.cookieFile}`);
      }
    }

    let subtitleArgs: SubtitleArgs | null = null;
    if (subtitles.enabled && !profile.audioOnly) {
      subtitleArgs = {
        languages: request.subtitleLanguages ?? subtitles.languages,
        format: subtitles.format,
      };
    }

    return buildYtdlpArgs({
      url: item.url,
      outputTemplate,
      mode: item.isPlaylist ? RunMode.PLAYLIST : RunMode.PER_ITEM,
      cookieFile,
      subtitles: subtitleArgs,
      nativeArchivePath: download.nativeArchiveFile ? join(request.destinationRoot, download.nativeArchiveFile) : null,
      retries: download.retries,
      fragmentRetries: download.fragmentRetries,
      concurrentFragments: download.concurrentFragments,
      userAgent: download.userAgent,
      extraArgs: download.extraArgs,
    });
  }
}
