import { join } from 'node:path';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';

/**
 * Chapter an item belongs to, when the site groups items that way
 */
export type Section = {
  number: number | null;
  title: string;
};

export type PathPlanOptions = {
  section?: Section | null;
  /** Items in the course; widens the index padding past 999 */
  itemCount?: number;
  /** Language code used in the subtitle file name */
  subtitleLanguage?: string;
};

export type PlannedPaths = {
  /** Folder the item is written to */
  directory: string;
  /** Path without extension shared by the video and its subtitles */
  stem: string;
  /** Output template for the tool; the tool fills in the extension */
  videoPath: string;
  /** Subtitle file next to the video */
  subtitlePath: string;
};

const MIN_INDEX_WIDTH = 3;
const DEFAULT_SUBTITLE_LANGUAGE = 'en';

/**
 * Plan where one item of a course is written
 *
 * Layout: `<root>/<course>[/<NN> - <section>]/<NNN> - <title>.<ext>`. The
 * zero-padded index keeps the default directory sort in play order.
 *
 * @throws RangeError if itemIndex is not a positive integer
 */
export function planPaths(
  destinationRoot: string,
  courseTitle: string,
  itemIndex: number,
  itemTitle: string,
  options: PathPlanOptions = {},
): PlannedPaths {
  if (!Number.isInteger(itemIndex) || itemIndex < 1) {
    throw new RangeError(`Item index must be a positive integer, got ${itemIndex}`);
  }

  const width = Math.max(MIN_INDEX_WIDTH, String(options.itemCount ?? 0).length);
  const segments = [destinationRoot, sanitizeFilename(courseTitle)];

  if (options.section) {
    segments.push(sectionFolder(options.section));
  }

  const directory = join(...segments);
  const stem = join(directory, `${String(itemIndex).padStart(width, '0')} - ${sanitizeFilename(itemTitle)}`);
  const language = sanitizeFilename(options.subtitleLanguage ?? DEFAULT_SUBTITLE_LANGUAGE);

  return {
    directory,
    stem,
    videoPath: `${escapeTemplate(stem)}.%(ext)s`,
    subtitlePath: `${stem}.${language}.srt`,
  };
}

/**
 * Output template for single-invocation mode, where the tool names every
 * entry of the playlist itself from its own metadata fields
 */
export function planPlaylistTemplate(destinationRoot: string, sectioned: boolean): string {
  const parts = [escapeTemplate(destinationRoot), '%(playlist_title,playlist|Untitled)s'];

  if (sectioned) {
    parts.push('%(chapter_number)02d - %(chapter|Untitled)s');
  }

  parts.push('%(playlist_index)03d - %(title)s.%(ext)s');
  return join(...parts);
}

function sectionFolder(section: Section): string {
  const title = sanitizeFilename(section.title);
  if (section.number === null) {
    return title;
  }
  return `${String(section.number).padStart(2, '0')} - ${title}`;
}

/**
 * `%` starts a field in the tool's output templates; literal text must double it
 */
function escapeTemplate(text: string): string {
  return text.replace(/%/g, '%%');
}
