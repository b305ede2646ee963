/**
 * Progress parser for yt-dlp output
 *
 * All knowledge of the tool's text format lives here. The format is not a stable
 * contract: unknown lines yield null and fields that fail to parse yield null,
 * so a format change degrades progress reporting instead of breaking a download.
 */

import type { ProgressEvent } from '../types/progress-event.types.js';
import { createProgressEvent } from '../types/progress-event.types.js';
import { ProgressKind } from '../types/progress-kind.js';
import { parseEta, parseSize } from '../utils/format-utils.js';

// [download]  23.8% of ~ 145.41MiB at  563.37KiB/s ETA 03:34 (frag 48/203)
// [download] 100% of   10.00MiB in 00:00:03 at 3.20MiB/s
const PERCENT_PATTERN =
  /^\[download\]\s+(\S+)%\s+of\s+~?\s*(\S+)(?:\s+in\s+\S+)?(?:\s+at\s+~?\s*(\S+))?(?:\s+ETA\s+(\S+))?/;

// [download]   12.50MiB at    1.20MiB/s (00:00:10)
const UNKNOWN_TOTAL_PATTERN = /^\[download\]\s+~?\s*[\d.]+\s*[KMGT]?i?B\s+at\s+~?\s*(\S+)/;

const DESTINATION_PATTERN = /^\[download\] Destination:\s*(.+)$/;

// [download] Downloading item 3 of 12 (older releases say "video")
const ITEM_PATTERN = /^\[download\] Downloading (?:item|video) (\d+) of (\d+)/;

const ALREADY_DOWNLOADED_PATTERN = /^\[download\] (.+) has already been downloaded/;

const ARCHIVED_PATTERN = /^\[download\] (.+?):? has already been recorded in (?:the )?archive/;

const POSTPROCESSOR_PATTERN =
  /^\[(Merger|ffmpeg|ExtractAudio|Fixup\w*|Metadata|EmbedSubtitle|EmbedThumbnail|MoveFiles|SubtitlesConvertor|VideoConvertor|VideoRemuxer|ThumbnailsConvertor)\]\s*(.*)$/;

const MERGE_TARGET_PATTERN = /Merging formats into "(.+)"/;

const ERROR_PATTERN = /^ERROR:\s*(.*)$/;

/**
 * Parse one complete line of tool output
 *
 * @param line - One line, with or without its terminator
 * @returns Structured event, or null for lines that carry no progress information
 */
export function parseProgressLine(line: string): ProgressEvent | null {
  const text = lastSegment(line);
  if (!text) {
    return null;
  }

  const progress = text.match(PERCENT_PATTERN);
  if (progress) {
    const [, percentText = '', sizeText = '', speed, etaText] = progress;
    const percent = parsePercent(percentText);
    return createProgressEvent(ProgressKind.DOWNLOADING, {
      percent,
      totalBytes: parseSize(sizeText),
      speed: speed && !speed.startsWith('Unknown') ? speed : null,
      etaSeconds: etaText !== undefined ? parseEta(etaText) : percent === 100 ? 0 : null,
    });
  }

  const unknownTotal = text.match(UNKNOWN_TOTAL_PATTERN);
  if (unknownTotal) {
    const speed = unknownTotal[1];
    return createProgressEvent(ProgressKind.DOWNLOADING, {
      speed: speed && !speed.startsWith('Unknown') ? speed : null,
    });
  }

  const item = text.match(ITEM_PATTERN);
  if (item?.[1] && item[2]) {
    return createProgressEvent(ProgressKind.STARTED, {
      itemIndex: Number.parseInt(item[1], 10),
      itemCount: Number.parseInt(item[2], 10),
    });
  }

  const destination = text.match(DESTINATION_PATTERN);
  if (destination?.[1]) {
    return createProgressEvent(ProgressKind.STARTED, { filename: destination[1].trim() });
  }

  const downloaded = text.match(ALREADY_DOWNLOADED_PATTERN);
  if (downloaded?.[1]) {
    return createProgressEvent(ProgressKind.ITEM_SKIPPED, {
      percent: 100,
      filename: downloaded[1].trim(),
      message: 'already downloaded',
    });
  }

  const archived = text.match(ARCHIVED_PATTERN);
  if (archived?.[1]) {
    return createProgressEvent(ProgressKind.ITEM_SKIPPED, {
      percent: 100,
      message: `${archived[1].trim()} is already in the archive`,
    });
  }

  const postprocessor = text.match(POSTPROCESSOR_PATTERN);
  if (postprocessor) {
    const detail = postprocessor[2] ?? '';
    const mergeTarget = detail.match(MERGE_TARGET_PATTERN)?.[1];
    return createProgressEvent(ProgressKind.POSTPROCESSING, {
      percent: 100,
      message: `${postprocessor[1]}: ${detail}`.trim(),
      ...(mergeTarget ? { filename: mergeTarget } : {}),
    });
  }

  const error = text.match(ERROR_PATTERN);
  if (error) {
    return createProgressEvent(ProgressKind.ITEM_FAILED, { message: error[1]?.trim() || 'Unknown error' });
  }

  return null;
}

/**
 * Without --newline the tool redraws progress with carriage returns;
 * only the last redraw of a line is meaningful.
 */
function lastSegment(line: string): string {
  const segments = line.split('\r').map((s) => s.trim());
  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];
    if (segment) return segment;
  }
  return '';
}

function parsePercent(text: string): number | null {
  const value = Number(text);
  if (text === '' || !Number.isFinite(value) || value < 0 || value > 100) {
    return null;
  }
  return value;
}
