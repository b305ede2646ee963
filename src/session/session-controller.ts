import { constants, existsSync } from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { join } from 'node:path';
import { ArchiveLedger } from '../archive/archive-ledger.js';
import type { ResolvedConfig } from '../config/resolved-config.types.js';
import { JobRunner } from '../downloader/job-runner.js';
import { PlaylistEnumerator, type Enumeration } from '../downloader/playlist-enumerator.js';
import type { ItemRunner, JobResult } from '../downloader/types.js';
import { AlreadyRunningError, ValidationError, errorMessage } from '../errors/custom-errors.js';
import { type SiteRegistry, siteRegistry } from '../sites/site-registry.js';
import type { ProgressEvent } from '../types/progress-event.types.js';
import { createProgressEvent } from '../types/progress-event.types.js';
import { ProgressKind } from '../types/progress-kind.js';
import type { DownloadRequest, QueueItem } from '../types/queue-item.types.js';
import { ItemStatus, isTerminalItemStatus } from '../types/queue-item.types.js';
import { FailurePolicy, RunMode } from '../types/run-mode.js';
import type {
  OverallProgressEvent,
  SessionListener,
  SessionOutcome,
  SessionState,
  SessionSummary,
} from '../types/session.types.js';
import { SessionStatus } from '../types/session.types.js';
import { logger } from '../utils/logger.js';
import { cleanUrlInput, isValidUrl, normalizeUrl } from '../utils/url-utils.js';

/**
 * Lists the entries of a request in per-item mode
 */
export type EntryEnumerator = {
  enumerate(request: DownloadRequest, signal: AbortSignal, cookieFile?: string): Promise<Enumeration>;
};

export type SessionControllerDependencies = {
  runner?: ItemRunner;
  enumerator?: EntryEnumerator;
  ledger?: ArchiveLedger;
  sites?: SiteRegistry;
};

const ITEM_TERMINAL_EVENTS: ReadonlyMap<ProgressEvent['kind'], ItemStatus> = new Map([
  [ProgressKind.ITEM_COMPLETE, ItemStatus.COMPLETED],
  [ProgressKind.ITEM_SKIPPED, ItemStatus.SKIPPED],
  [ProgressKind.ITEM_FAILED, ItemStatus.FAILED],
  [ProgressKind.CANCELLED, ItemStatus.CANCELLED],
]);

function createInitialState(): SessionState {
  return {
    status: SessionStatus.IDLE,
    current: null,
    items: [],
    completedCount: 0,
    skippedCount: 0,
    failedCount: 0,
    bytesProcessed: 0,
    overallPercent: 0,
    cancelRequested: false,
    outcome: null,
  };
}

/**
 * Owns one download session at a time: turns a request into queue items,
 * runs them in order and publishes aggregated progress
 */
export class SessionController {
  private state: SessionState = createInitialState();
  private readonly listeners: Set<SessionListener> = new Set();
  private readonly runner: ItemRunner;
  private readonly enumerator: EntryEnumerator;
  private readonly ledger: ArchiveLedger;
  private readonly sites: SiteRegistry;
  private abortController: AbortController | null = null;
  /** Set from the first line of start() so a second call cannot slip in during validation */
  private busy = false;

  constructor(
    private readonly config: ResolvedConfig,
    dependencies: SessionControllerDependencies = {},
  ) {
    this.runner =
      dependencies.runner ??
      new JobRunner({ ytdlpPath: config.ytdlpPath, download: config.download, subtitles: config.subtitles });
    this.enumerator =
      dependencies.enumerator ??
      new PlaylistEnumerator({
        ytdlpPath: config.ytdlpPath,
        graceMs: config.download.graceMs,
        userAgent: config.download.userAgent,
      });
    this.ledger = dependencies.ledger ?? new ArchiveLedger();
    this.sites = dependencies.sites ?? siteRegistry;
  }

  /**
   * Run a request to its end
   *
   * @returns Summary once the session is COMPLETED, CANCELLED or FAILED
   * @throws AlreadyRunningError if a session is running
   * @throws ValidationError if the request is rejected; the session does not start
   */
  async start(request: DownloadRequest): Promise<SessionSummary> {
    if (this.busy) {
      throw new AlreadyRunningError();
    }
    this.busy = true;
    // Created before validation so a cancel issued meanwhile is kept
    const abortController = new AbortController();
    this.abortController = abortController;

    let accepted: DownloadRequest;
    try {
      accepted = await this.validate(request);
    } catch (error) {
      this.abortController = null;
      this.busy = false;
      throw error;
    }

    this.state = {
      ...createInitialState(),
      status: SessionStatus.RUNNING,
      cancelRequested: abortController.signal.aborted,
    };

    try {
      await this.runSession(accepted, abortController.signal);
    } catch (error) {
      if (this.state.outcome === null) {
        this.state.outcome = abortController.signal.aborted ? SessionStatus.CANCELLED : SessionStatus.FAILED;
      }
      if (this.state.outcome === SessionStatus.FAILED) {
        this.state.error = errorMessage(error);
        logger.debug(`Session failed: ${this.state.error}`);
      }
    } finally {
      this.ledger.close();
      this.abortController = null;
    }

    const outcome = this.state.outcome ?? SessionStatus.COMPLETED;
    this.finish(outcome);
    this.busy = false;
    return this.getSummary(outcome);
  }

  /**
   * Request cancellation of the session being started or run; has no effect otherwise
   */
  cancel(): void {
    if (!this.busy || !this.abortController) {
      return;
    }
    if (!this.abortController.signal.aborted) {
      logger.warning('Cancelling download session...');
    }
    this.state.cancelRequested = true;
    this.abortController.abort();
  }

  /**
   * @returns Function that removes the listener
   */
  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getState(): Readonly<SessionState> {
    return {
      ...this.state,
      current: this.state.current ? { ...this.state.current } : null,
      items: this.state.items.map((item) => ({ ...item })),
    };
  }

  private async validate(request: DownloadRequest): Promise<DownloadRequest> {
    const url = cleanUrlInput(request.url);
    if (!url) {
      throw new ValidationError('URL is empty', 'url');
    }
    if (!isValidUrl(url)) {
      throw new ValidationError(`Not a valid http(s) URL: "${url}"`, 'url');
    }

    const destinationRoot = request.destinationRoot.trim();
    if (!destinationRoot) {
      throw new ValidationError('Destination directory is empty', 'destinationRoot');
    }

    try {
      await fsPromises.mkdir(destinationRoot, { recursive: true });
      await fsPromises.access(destinationRoot, constants.W_OK);
    } catch (error) {
      throw new ValidationError(
        `Destination directory is not writable: ${destinationRoot} (${errorMessage(error)})`,
        'destinationRoot',
      );
    }

    let cookieFile = request.cookieFile?.trim() || undefined;
    if (cookieFile && !existsSync(cookieFile)) {
      logger.warning(`Cookie file not found, continuing without it: ${cookieFile}`);
      cookieFile = undefined;
    }

    return Object.freeze({
      url,
      siteType: request.siteType,
      destinationRoot,
      ...(cookieFile ? { cookieFile } : {}),
      ...(request.subtitleLanguages ? { subtitleLanguages: [...request.subtitleLanguages] } : {}),
    });
  }

  private async runSession(request: DownloadRequest, signal: AbortSignal): Promise<void> {
    const { download } = this.config;
    const profile = this.sites.resolve(request.siteType, request.url);

    const known = this.ledger.load(join(request.destinationRoot, download.ledgerFile));
    logger.info(`${profile.label}: ${request.url} (${known.size} item(s) in archive)`);

    if (signal.aborted) {
      this.state.outcome = SessionStatus.CANCELLED;
      return;
    }

    const items = await this.buildQueue(request, signal);
    this.state.items = items;
    logger.info(`${items.length} item(s) queued`);

    for (const item of items) {
      if (signal.aborted) {
        break;
      }

      this.state.current = item;

      if (this.ledger.contains(item.id)) {
        logger.debug(`Skipping ${this.describe(item)}: already in archive`);
        this.settle(item, ItemStatus.SKIPPED);
        this.publish(
          item,
          createProgressEvent(ProgressKind.ITEM_SKIPPED, {
            percent: 100,
            itemIndex: item.index,
            itemCount: items.length,
            message: 'already in archive',
          }),
        );
        continue;
      }

      item.status = ItemStatus.RUNNING;
      this.publish(
        item,
        createProgressEvent(ProgressKind.STARTED, {
          percent: 0,
          itemIndex: item.index,
          itemCount: items.length,
          ...(item.title ? { message: item.title } : {}),
        }),
      );

      const result = await this.runner.run(
        { request, item, itemCount: items.length, profile },
        (event) => this.onItemEvent(item, event),
        signal,
      );

      this.applyResult(item, result);

      if (result.outcome === 'failed' && download.failurePolicy === FailurePolicy.ABORT) {
        this.state.outcome = SessionStatus.FAILED;
        this.state.error = `Stopped after ${this.describe(item)} failed: ${result.error ?? 'unknown error'}`;
        logger.debug(this.state.error);
        break;
      }
      if (result.outcome === 'cancelled') {
        break;
      }
    }

    if (this.state.outcome === null && signal.aborted && items.some((item) => !this.isSettledSuccess(item))) {
      this.state.outcome = SessionStatus.CANCELLED;
    }
  }

  private async buildQueue(request: DownloadRequest, signal: AbortSignal): Promise<QueueItem[]> {
    if (this.config.download.mode === RunMode.PLAYLIST) {
      const id = normalizeUrl(request.url);
      return [
        {
          id,
          url: request.url,
          index: 1,
          title: null,
          courseTitle: id,
          section: null,
          isPlaylist: true,
          status: ItemStatus.QUEUED,
        },
      ];
    }

    const { courseTitle, entries } = await this.enumerator.enumerate(request, signal, request.cookieFile);
    return entries.map((entry, i) => ({
      id: entry.id,
      url: entry.url,
      index: i + 1,
      title: entry.title,
      courseTitle,
      section: entry.section,
      isPlaylist: false,
      status: ItemStatus.QUEUED,
    }));
  }

  private onItemEvent(item: QueueItem, event: ProgressEvent): void {
    if (!item.isPlaylist) {
      const status = ITEM_TERMINAL_EVENTS.get(event.kind);
      if (status) {
        this.settle(item, status);
      }
    }
    this.publish(item, event);
  }

  private applyResult(item: QueueItem, result: JobResult): void {
    this.settle(item, result.outcome);

    if (result.outcome === 'completed' || result.outcome === 'skipped') {
      this.ledger.append(item.id);
      this.state.bytesProcessed += result.totalBytes;
      logger.debug(`${this.describe(item)} ${result.outcome}`);
    } else if (result.outcome === 'failed') {
      logger.debug(`${this.describe(item)} failed: ${result.error ?? 'unknown error'}`);
    }
  }

  /**
   * Move an item to its terminal status once; later calls are ignored
   */
  private settle(item: QueueItem, status: ItemStatus): void {
    if (isTerminalItemStatus(item.status)) {
      return;
    }
    item.status = status;

    if (status === ItemStatus.COMPLETED) this.state.completedCount++;
    else if (status === ItemStatus.SKIPPED) this.state.skippedCount++;
    else if (status === ItemStatus.FAILED) this.state.failedCount++;
  }

  private publish(item: QueueItem | null, event: ProgressEvent, final?: { outcome: SessionOutcome }): void {
    const itemCount = event.itemCount ?? Math.max(this.state.items.length, 1);
    const itemIndex = event.itemIndex ?? item?.index ?? 0;

    this.advancePercent(event, itemIndex, itemCount);

    const overall: OverallProgressEvent = {
      itemIndex,
      itemCount,
      overallPercent: this.state.overallPercent,
      item: item ? { ...item } : null,
      event,
      completedCount: this.state.completedCount,
      skippedCount: this.state.skippedCount,
      failedCount: this.state.failedCount,
      ...(final ? { outcome: final.outcome } : {}),
      ...(final && this.state.error ? { error: this.state.error } : {}),
    };

    for (const listener of this.listeners) {
      try {
        listener(overall);
      } catch (error) {
        logger.error(`Progress listener failed: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * overall = ((index - 1) + itemPercent / 100) / count * 100, never decreasing
   */
  private advancePercent(event: ProgressEvent, itemIndex: number, itemCount: number): void {
    if (itemIndex < 1 || itemCount < 1) {
      return;
    }

    let fraction: number | null = null;
    switch (event.kind) {
      case ProgressKind.ITEM_COMPLETE:
      case ProgressKind.ITEM_SKIPPED:
      case ProgressKind.ITEM_FAILED:
        fraction = 1;
        break;
      case ProgressKind.DOWNLOADING:
      case ProgressKind.STARTED:
        fraction = event.percent !== null ? event.percent / 100 : null;
        break;
      default:
        break;
    }

    if (fraction === null) {
      return;
    }

    const candidate = Math.min(100, ((itemIndex - 1 + fraction) / itemCount) * 100);
    this.state.overallPercent = Math.max(this.state.overallPercent, candidate);
  }

  private finish(outcome: SessionOutcome): void {
    if (outcome === SessionStatus.COMPLETED) {
      this.state.overallPercent = 100;
    }
    for (const item of this.state.items) {
      if (item.status === ItemStatus.RUNNING) {
        item.status = outcome === SessionStatus.CANCELLED ? ItemStatus.CANCELLED : ItemStatus.FAILED;
      }
    }

    this.state.status = outcome;
    this.state.outcome = outcome;

    const itemCount = this.state.items.length;
    this.publish(
      this.state.current,
      createProgressEvent(ProgressKind.SESSION_COMPLETE, {
        percent: this.state.overallPercent,
        itemIndex: this.state.current?.index ?? null,
        itemCount,
        ...(this.state.error ? { message: this.state.error } : {}),
      }),
      { outcome },
    );

    logger.debug(
      `Session ${outcome}: ${this.state.completedCount} completed, ${this.state.skippedCount} skipped, ${this.state.failedCount} failed`,
    );
  }

  private getSummary(outcome: SessionOutcome): SessionSummary {
    return {
      outcome,
      itemCount: this.state.items.length,
      completedCount: this.state.completedCount,
      skippedCount: this.state.skippedCount,
      failedCount: this.state.failedCount,
      bytesProcessed: this.state.bytesProcessed,
      ...(this.state.error ? { error: this.state.error } : {}),
    };
  }

  private isSettledSuccess(item: QueueItem): boolean {
    return item.status === ItemStatus.COMPLETED || item.status === ItemStatus.SKIPPED;
  }

  private describe(item: QueueItem): string {
    return `#${item.index}${item.title ? ` "${item.title}"` : ''}`;
  }
}
