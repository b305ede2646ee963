import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ArchiveLedger } from '../archive/archive-ledger.js';
import { defaults } from '../config/config-defaults.js';
import type { ResolvedConfig, ResolvedDownloadSettings } from '../config/resolved-config.types.js';
import { JobRunner } from '../downloader/job-runner.js';
import type { Enumeration } from '../downloader/playlist-enumerator.js';
import type { DownloadJob, ItemRunner, JobOutcome, JobResult, ProgressListener } from '../downloader/types.js';
import { AlreadyRunningError, EnumerationError, ProcessLaunchError, ValidationError } from '../errors/custom-errors.js';
import { SiteType } from '../sites/site-type.js';
import type { ProgressEvent } from '../types/progress-event.types.js';
import { createProgressEvent } from '../types/progress-event.types.js';
import { ProgressKind } from '../types/progress-kind.js';
import type { DownloadRequest } from '../types/queue-item.types.js';
import type { OverallProgressEvent } from '../types/session.types.js';
import { SessionController } from './session-controller.js';

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock('execa', () => ({ execa: execaMock }));

/**
 * Stand-in for a yt-dlp run that finishes its download and exits cleanly
 */
function finishedSubprocess() {
  return {
    async *iterable() {
      yield '[download] 100% of 1.00KiB';
    },
    then<A, B>(onFulfilled: (value: { exitCode: number }) => A, onRejected: (reason: unknown) => B) {
      return Promise.resolve({ exitCode: 0 }).then(onFulfilled, onRejected);
    },
  };
}

type Step = {
  outcome?: JobOutcome;
  /** Emitted before the terminal event */
  events?: ProgressEvent[];
  error?: string;
  /** Block until the session is cancelled */
  untilCancelled?: boolean;
  throws?: Error;
};

/**
 * Runner that plays a scripted result per item id instead of starting yt-dlp
 */
class ScriptedRunner implements ItemRunner {
  readonly calls: DownloadJob[] = [];

  constructor(private readonly steps: Record<string, Step> = {}) {}

  get ids(): string[] {
    return this.calls.map((job) => job.item.id);
  }

  async run(job: DownloadJob, onEvent: ProgressListener, signal: AbortSignal): Promise<JobResult> {
    this.calls.push(job);
    const step = this.steps[job.item.id] ?? {};
    const at = { itemIndex: job.item.index, itemCount: job.itemCount };

    if (step.throws) {
      throw step.throws;
    }

    const events = step.events ?? [createProgressEvent(ProgressKind.DOWNLOADING, { percent: 50, totalBytes: 1000 })];
    for (const event of events) {
      onEvent({ ...event, ...at });
    }

    if (step.untilCancelled) {
      await new Promise<void>((resolve) => {
        if (signal.aborted) resolve();
        else signal.addEventListener('abort', () => resolve(), { once: true });
      });
      onEvent(createProgressEvent(ProgressKind.CANCELLED, at));
      return { outcome: 'cancelled', totalBytes: 0 };
    }

    const outcome = step.outcome ?? 'completed';
    if (outcome === 'failed') {
      const error = step.error ?? 'boom';
      onEvent(createProgressEvent(ProgressKind.ITEM_FAILED, { ...at, message: error }));
      return { outcome, totalBytes: 0, error };
    }

    const kind = outcome === 'skipped' ? ProgressKind.ITEM_SKIPPED : ProgressKind.ITEM_COMPLETE;
    onEvent(createProgressEvent(kind, { ...at, percent: 100 }));
    return { outcome, totalBytes: 1000 };
  }
}

const COURSE: Enumeration = {
  courseTitle: 'Course',
  entries: [
    { id: 'site a', url: 'https://example.com/v/a', title: 'A', section: null },
    { id: 'site b', url: 'https://example.com/v/b', title: 'B', section: null },
    { id: 'site c', url: 'https://example.com/v/c', title: 'C', section: null },
  ],
};

describe('SessionController', () => {
  let root: string;
  let events: OverallProgressEvent[];
  let ledger: ArchiveLedger;
  const enumerate = vi.fn(async (_request: DownloadRequest, _signal: AbortSignal) => COURSE);

  const makeConfig = (download: Partial<ResolvedDownloadSettings> = {}): ResolvedConfig => ({
    ...defaults,
    download: { ...defaults.download, ...download },
  });

  const makeRequest = (overrides: Partial<DownloadRequest> = {}): DownloadRequest => ({
    url: 'https://example.com/course',
    siteType: SiteType.AUTO,
    destinationRoot: root,
    ...overrides,
  });

  const makeController = (runner: ItemRunner, download: Partial<ResolvedDownloadSettings> = {}) => {
    const controller = new SessionController(makeConfig(download), { runner, enumerator: { enumerate }, ledger });
    controller.subscribe((event) => events.push(event));
    return controller;
  };

  const ledgerPath = (): string => join(root, defaults.download.ledgerFile);
  const kinds = (): string[] => events.map((e) => e.event.kind);

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'coursegrab-session-'));
    events = [];
    ledger = new ArchiveLedger();
    enumerate.mockClear();
    execaMock.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('should complete every item, record each in the ledger and reach 100%', async () => {
    const runner = new ScriptedRunner();
    const controller = makeController(runner);

    const summary = await controller.start(makeRequest());

    expect(runner.ids).toEqual(['site a', 'site b', 'site c']);
    expect(kinds().filter((k) => k === ProgressKind.ITEM_COMPLETE)).toHaveLength(3);
    expect(readFileSync(ledgerPath(), 'utf-8')).toBe('site a\nsite b\nsite c\n');
    expect(summary).toEqual({
      outcome: 'completed',
      itemCount: 3,
      completedCount: 3,
      skippedCount: 0,
      failedCount: 0,
      bytesProcessed: 3000,
    });
    expect(controller.getState().status).toBe('completed');

    const last = events.at(-1);
    expect(last?.event.kind).toBe(ProgressKind.SESSION_COMPLETE);
    expect(last?.outcome).toBe('completed');
    expect(last?.overallPercent).toBe(100);
  });

  it('should aggregate overall percent without going backwards', async () => {
    const controller = makeController(new ScriptedRunner());

    await controller.start(makeRequest());

    const midItemTwo = events.find((e) => e.itemIndex === 2 && e.event.kind === ProgressKind.DOWNLOADING);
    expect(midItemTwo?.overallPercent).toBe(50);

    const percents = events.map((e) => e.overallPercent);
    expect(percents).toEqual([...percents].sort((a, b) => a - b));
  });

  it('should skip ledger entries without invoking the runner', async () => {
    writeFileSync(ledgerPath(), 'site b\n');
    const runner = new ScriptedRunner();
    const controller = makeController(runner);

    const summary = await controller.start(makeRequest());

    expect(runner.ids).toEqual(['site a', 'site c']);
    const skips = events.filter((e) => e.event.kind === ProgressKind.ITEM_SKIPPED);
    expect(skips).toHaveLength(1);
    expect(skips[0]?.itemIndex).toBe(2);
    expect(skips[0]?.skippedCount).toBe(1);
    expect(summary.completedCount).toBe(2);
    expect(summary.skippedCount).toBe(1);
  });

  it('should skip every item on a rerun against a populated ledger', async () => {
    await makeController(new ScriptedRunner()).start(makeRequest());
    events = [];

    const rerun = new ScriptedRunner();
    const summary = await makeController(rerun).start(makeRequest());

    expect(rerun.calls).toHaveLength(0);
    expect(kinds().filter((k) => k === ProgressKind.ITEM_SKIPPED)).toHaveLength(3);
    expect(summary).toMatchObject({ outcome: 'completed', skippedCount: 3, completedCount: 0 });
  });

  it('should continue after a failed item by default', async () => {
    const runner = new ScriptedRunner({ 'site b': { outcome: 'failed', error: 'HTTP Error 403' } });
    const controller = makeController(runner);

    const summary = await controller.start(makeRequest());

    expect(runner.ids).toEqual(['site a', 'site b', 'site c']);
    const failure = events.find((e) => e.event.kind === ProgressKind.ITEM_FAILED);
    expect(failure?.itemIndex).toBe(2);
    expect(failure?.event.message).toBe('HTTP Error 403');
    expect(failure?.failedCount).toBe(1);
    expect(summary).toMatchObject({ outcome: 'completed', completedCount: 2, failedCount: 1 });
    expect(readFileSync(ledgerPath(), 'utf-8')).toBe('site a\nsite c\n');
  });

  it('should stop with FAILED under the abort policy', async () => {
    const runner = new ScriptedRunner({ 'site b': { outcome: 'failed', error: 'HTTP Error 403' } });
    const controller = makeController(runner, { failurePolicy: 'abort' });

    const summary = await controller.start(makeRequest());

    expect(runner.ids).toEqual(['site a', 'site b']);
    expect(summary.outcome).toBe('failed');
    expect(summary.error).toBe('Stopped after #2 "B" failed: HTTP Error 403');
    expect(controller.getState().items.map((item) => item.status)).toEqual(['completed', 'failed', 'queued']);
  });

  it('should cancel the running item and abandon the rest', async () => {
    const runner = new ScriptedRunner({ 'site b': { untilCancelled: true } });
    const controller = makeController(runner);
    controller.subscribe((e) => {
      if (e.itemIndex === 2 && e.event.kind === ProgressKind.DOWNLOADING) {
        controller.cancel();
        controller.cancel();
      }
    });

    const summary = await controller.start(makeRequest());

    expect(runner.ids).toEqual(['site a', 'site b']);
    expect(summary.outcome).toBe('cancelled');
    expect(readFileSync(ledgerPath(), 'utf-8')).toBe('site a\n');

    const state = controller.getState();
    expect(state.status).toBe('cancelled');
    expect(state.cancelRequested).toBe(true);
    expect(state.items.map((item) => item.status)).toEqual(['completed', 'cancelled', 'queued']);
    expect(kinds().filter((k) => k === ProgressKind.SESSION_COMPLETE)).toHaveLength(1);
    expect(events.at(-1)?.outcome).toBe('cancelled');
  });

  it('should honour a cancel issued while the request is being validated', async () => {
    const runner = new ScriptedRunner();
    const controller = makeController(runner);

    const pending = controller.start(makeRequest());
    controller.cancel();
    const summary = await pending;

    expect(summary.outcome).toBe('cancelled');
    expect(summary.itemCount).toBe(0);
    expect(enumerate).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(0);
    expect(controller.getState().cancelRequested).toBe(true);
    expect(events.at(-1)?.event.kind).toBe(ProgressKind.SESSION_COMPLETE);
    expect(events.at(-1)?.outcome).toBe('cancelled');
  });

  it('should end CANCELLED when cancelled while entries are being listed', async () => {
    const runner = new ScriptedRunner();
    const controller = makeController(runner);
    enumerate.mockImplementationOnce(
      (request, signal) =>
        new Promise<Enumeration>((_resolve, reject) => {
          signal.addEventListener(
            'abort',
            () => reject(new EnumerationError('Could not list entries', request.url)),
            { once: true },
          );
          setTimeout(() => controller.cancel(), 0);
        }),
    );

    const summary = await controller.start(makeRequest());

    expect(enumerate).toHaveBeenCalledTimes(1);
    expect(summary.outcome).toBe('cancelled');
    expect(summary.itemCount).toBe(0);
    expect(summary.error).toBeUndefined();
    expect(runner.calls).toHaveLength(0);
    expect(events.at(-1)?.outcome).toBe('cancelled');
  });

  it('should go on with later items when one output folder cannot be created', async () => {
    execaMock.mockImplementation(() => finishedSubprocess());
    enumerate.mockResolvedValueOnce({
      courseTitle: 'Course',
      entries: [
        { id: 'site a', url: 'https://example.com/v/a', title: 'A', section: { number: 1, title: 'Intro' } },
        { id: 'site b', url: 'https://example.com/v/b', title: 'B', section: { number: 2, title: 'Blocked' } },
        { id: 'site c', url: 'https://example.com/v/c', title: 'C', section: { number: 3, title: 'End' } },
      ],
    });
    mkdirSync(join(root, 'Course'));
    writeFileSync(join(root, 'Course', '02 - Blocked'), 'not a folder');

    const config = makeConfig();
    const runner = new JobRunner({ ytdlpPath: 'yt-dlp', download: config.download, subtitles: config.subtitles });
    const controller = new SessionController(config, { runner, enumerator: { enumerate }, ledger });
    controller.subscribe((event) => events.push(event));

    const summary = await controller.start(makeRequest({ siteType: SiteType.LINKEDIN }));

    expect(summary).toMatchObject({ outcome: 'completed', itemCount: 3, completedCount: 2, failedCount: 1 });
    expect(execaMock).toHaveBeenCalledTimes(2);
    expect(readFileSync(ledgerPath(), 'utf-8')).toBe('site a\nsite c\n');
    expect(controller.getState().items.map((item) => item.status)).toEqual(['completed', 'failed', 'completed']);

    const failure = events.find((e) => e.event.kind === ProgressKind.ITEM_FAILED);
    expect(failure?.itemIndex).toBe(2);
    expect(failure?.event.message).toMatch(/^Could not prepare output folder: /);
  });

  it('should ignore cancel while idle', () => {
    const controller = makeController(new ScriptedRunner());

    controller.cancel();

    expect(controller.getState()).toMatchObject({ status: 'idle', cancelRequested: false });
  });

  it('should preserve the order of runner events', async () => {
    const runner = new ScriptedRunner({
      'site a': {
        events: [
          createProgressEvent(ProgressKind.STARTED, { filename: 'a.f137.mp4' }),
          createProgressEvent(ProgressKind.DOWNLOADING, { percent: 10 }),
          createProgressEvent(ProgressKind.DOWNLOADING, { percent: 60 }),
          createProgressEvent(ProgressKind.POSTPROCESSING, { filename: 'a.mp4' }),
        ],
      },
    });
    const controller = makeController(runner);

    await controller.start(makeRequest());

    const first = events.filter((e) => e.itemIndex === 1 && e.event.kind !== ProgressKind.SESSION_COMPLETE);
    expect(first.map((e) => e.event.kind)).toEqual([
      ProgressKind.STARTED,
      ProgressKind.STARTED,
      ProgressKind.DOWNLOADING,
      ProgressKind.DOWNLOADING,
      ProgressKind.POSTPROCESSING,
      ProgressKind.ITEM_COMPLETE,
    ]);
    expect(first.map((e) => e.event.percent)).toEqual([0, null, 10, 60, null, 100]);
  });

  it('should reject a second start while running', async () => {
    const runner = new ScriptedRunner({ 'site a': { untilCancelled: true } });
    const controller = makeController(runner);
    const running = new Promise<void>((resolve) => {
      controller.subscribe((e) => {
        if (e.event.kind === ProgressKind.DOWNLOADING) resolve();
      });
    });

    const first = controller.start(makeRequest());
    await expect(controller.start(makeRequest())).rejects.toBeInstanceOf(AlreadyRunningError);
    await running;
    await expect(controller.start(makeRequest())).rejects.toBeInstanceOf(AlreadyRunningError);

    controller.cancel();
    await expect(first).resolves.toMatchObject({ outcome: 'cancelled' });
  });

  it('should reject invalid requests without starting', async () => {
    const controller = makeController(new ScriptedRunner());
    const blocker = join(root, 'file.txt');
    writeFileSync(blocker, 'x');

    await expect(controller.start(makeRequest({ url: '   ' }))).rejects.toMatchObject({ field: 'url' });
    await expect(controller.start(makeRequest({ url: 'ftp://example.com/x' }))).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(controller.start(makeRequest({ destinationRoot: join(blocker, 'sub') }))).rejects.toMatchObject({
      field: 'destinationRoot',
    });

    expect(enumerate).not.toHaveBeenCalled();
    expect(events).toHaveLength(0);
    expect(controller.getState().status).toBe('idle');
  });

  it('should accept a quoted URL with surrounding whitespace', async () => {
    const controller = makeController(new ScriptedRunner());

    await controller.start(makeRequest({ url: '  "https://example.com/course"  ' }));

    expect(enumerate.mock.calls[0]?.[0].url).toBe('https://example.com/course');
  });

  it('should fail the session when the tool cannot be launched', async () => {
    const runner = new ScriptedRunner({
      'site a': { throws: new ProcessLaunchError('Cannot start "yt-dlp": not found (ENOENT)', 'yt-dlp') },
    });
    const closeSpy = vi.spyOn(ledger, 'close');
    const controller = makeController(runner);

    const summary = await controller.start(makeRequest());

    expect(summary.outcome).toBe('failed');
    expect(summary.error).toBe('Cannot start "yt-dlp": not found (ENOENT)');
    expect(runner.ids).toEqual(['site a']);
    expect(closeSpy).toHaveBeenCalled();
    expect(controller.getState().items[0]?.status).toBe('failed');
    expect(events.at(-1)).toMatchObject({ outcome: 'failed', error: 'Cannot start "yt-dlp": not found (ENOENT)' });
  });

  it('should fail the session when enumeration fails', async () => {
    enumerate.mockRejectedValueOnce(new EnumerationError('Could not list entries', 'https://example.com/course'));
    const runner = new ScriptedRunner();
    const controller = makeController(runner);

    const summary = await controller.start(makeRequest());

    expect(summary).toMatchObject({ outcome: 'failed', itemCount: 0, error: 'Could not list entries' });
    expect(runner.calls).toHaveLength(0);
  });

  it('should run a whole playlist as one item in playlist mode', async () => {
    const runner = new ScriptedRunner();
    const controller = makeController(runner, { mode: 'playlist' });

    const summary = await controller.start(
      makeRequest({ url: 'https://www.youtube.com/playlist?list=PL1&utm_source=share' }),
    );

    expect(enumerate).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0]?.item).toMatchObject({
      id: 'https://www.youtube.com/playlist?list=PL1',
      isPlaylist: true,
      index: 1,
    });
    expect(summary.completedCount).toBe(1);
    expect(readFileSync(ledgerPath(), 'utf-8')).toBe('https://www.youtube.com/playlist?list=PL1\n');
  });

  it('should keep running when a listener throws', async () => {
    const controller = makeController(new ScriptedRunner());
    const unsubscribe = controller.subscribe(() => {
      throw new Error('render failed');
    });

    const summary = await controller.start(makeRequest());
    unsubscribe();

    expect(summary.outcome).toBe('completed');
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Progress listener failed: render failed'));
  });

  it('should stop delivering events after unsubscribe', async () => {
    const controller = new SessionController(makeConfig(), {
      runner: new ScriptedRunner(),
      enumerator: { enumerate },
      ledger,
    });
    const received: OverallProgressEvent[] = [];
    const unsubscribe = controller.subscribe((e) => received.push(e));
    unsubscribe();

    await controller.start(makeRequest());

    expect(received).toHaveLength(0);
  });
});
