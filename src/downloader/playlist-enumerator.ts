import { execa } from 'execa';
import { z } from 'zod';
import { EnumerationError, errorMessage } from '../errors/custom-errors.js';
import type { Section } from '../paths/path-planner.js';
import type { DownloadRequest } from '../types/queue-item.types.js';
import { logger } from '../utils/logger.js';
import { normalizeUrl } from '../utils/url-utils.js';
import { isLaunchFailure, isSubprocessFailure, lastErrorLine, toLaunchError } from './subprocess-errors.js';
import { buildEnumerateArgs } from './ytdlp-args.js';

const InfoFieldsSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  url: z.string().nullish(),
  webpage_url: z.string().nullish(),
  title: z.string().nullish(),
  ie_key: z.string().nullish(),
  extractor_key: z.string().nullish(),
  chapter: z.string().nullish(),
  chapter_number: z.number().nullish(),
});

type InfoFields = z.infer<typeof InfoFieldsSchema>;

/**
 * Output of `--flat-playlist --dump-single-json`; unknown fields are ignored
 */
const InfoSchema = InfoFieldsSchema.extend({
  _type: z.string().nullish(),
  playlist_title: z.string().nullish(),
  entries: z.array(InfoFieldsSchema.nullable()).nullish(),
});

export type EnumeratedEntry = {
  /** Ledger identifier, `"<extractor> <id>"` when the tool reports both */
  id: string;
  url: string;
  title: string;
  section: Section | null;
};

export type Enumeration = {
  courseTitle: string;
  entries: EnumeratedEntry[];
};

export type PlaylistEnumeratorOptions = {
  ytdlpPath: string;
  graceMs: number;
  userAgent: string | null;
};

/**
 * Lists the entries of a course or playlist without downloading them
 */
export class PlaylistEnumerator {
  constructor(private readonly options: PlaylistEnumeratorOptions) {}

  /**
   * @param cookieFile - Passed through when the caller has checked it exists
   * @throws ProcessLaunchError if the binary cannot be started
   * @throws EnumerationError if the tool fails or prints unusable JSON
   */
  async enumerate(request: DownloadRequest, signal: AbortSignal, cookieFile?: string): Promise<Enumeration> {
    const binary = this.options.ytdlpPath;
    const args = buildEnumerateArgs(request.url, cookieFile, this.options.userAgent);
    logger.debug(`Enumerating: ${binary} ${args.join(' ')}`);

    let stdout: string;
    try {
      const result = await execa(binary, args, {
        stdin: 'ignore',
        cancelSignal: signal,
        forceKillAfterDelay: this.options.graceMs,
      });
      stdout = String(result.stdout);
    } catch (error) {
      if (isSubprocessFailure(error) && isLaunchFailure(error)) {
        throw toLaunchError(binary, error);
      }
      const detail = (isSubprocessFailure(error) && lastErrorLine(error.stderr)) || errorMessage(error);
      throw new EnumerationError(`Could not list entries of ${request.url}: ${detail}`, request.url, { cause: error });
    }

    return parseEnumeration(stdout, request.url);
  }
}

/**
 * Turn the tool's JSON dump into ordered entries
 *
 * @throws EnumerationError
 */
export function parseEnumeration(json: string, requestUrl: string): Enumeration {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new EnumerationError(`Invalid JSON from yt-dlp for ${requestUrl}`, requestUrl, { cause: error });
  }

  const parsed = InfoSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    throw new EnumerationError(`Unexpected JSON from yt-dlp for ${requestUrl}: ${where}`, requestUrl);
  }

  const info = parsed.data;

  if (info._type !== 'playlist' || !info.entries) {
    return {
      courseTitle: info.playlist_title ?? info.title ?? 'Untitled',
      entries: [toEntry(info, requestUrl, 1)],
    };
  }

  const entries = info.entries
    .filter((entry): entry is InfoFields => entry !== null)
    .map((entry, i) => toEntry(entry, requestUrl, i + 1));

  return {
    courseTitle: info.title ?? info.playlist_title ?? 'Untitled',
    entries,
  };
}

function toEntry(info: InfoFields, requestUrl: string, position: number): EnumeratedEntry {
  const url = info.webpage_url ?? info.url ?? requestUrl;
  const id = info.id !== null && info.id !== undefined ? String(info.id) : null;
  const extractor = info.extractor_key ?? info.ie_key;

  return {
    id: extractor && id ? `${extractor.toLowerCase()} ${id}` : normalizeUrl(url),
    url,
    title: info.title ?? id ?? `item ${position}`,
    section: info.chapter ? { number: info.chapter_number ?? null, title: info.chapter } : null,
  };
}
