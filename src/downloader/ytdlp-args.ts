import type { RunMode } from '../types/run-mode.js';

export type SubtitleArgs = {
  /** Empty means every language */
  languages: readonly string[];
  format: string;
};

export type YtdlpArgsInput = {
  url: string;
  /** Output template (-o) */
  outputTemplate: string;
  mode: RunMode;
  /** Cookie file in Netscape format; only passed when it exists */
  cookieFile?: string;
  /** null skips subtitles */
  subtitles: SubtitleArgs | null;
  /** Archive file for the tool's own duplicate check */
  nativeArchivePath: string | null;
  retries: number;
  fragmentRetries: number;
  concurrentFragments: number;
  userAgent: string | null;
  /** Additional yt-dlp CLI arguments (flexible - any yt-dlp args) */
  extraArgs: readonly string[];
};

/**
 * Build the argument list for one download invocation
 */
export function buildYtdlpArgs(input: YtdlpArgsInput): string[] {
  const args = [
    '--newline',
    '--no-warnings',
    '--windows-filenames',
    '--no-overwrites',
    '--continue',
    '--retries',
    String(input.retries),
    '--fragment-retries',
    String(input.fragmentRetries),
    '--concurrent-fragments',
    String(input.concurrentFragments),
    '-o',
    input.outputTemplate,
  ];

  if (input.cookieFile) {
    args.unshift('--cookies', input.cookieFile);
  }

  if (input.subtitles) {
    const languages = input.subtitles.languages.length > 0 ? input.subtitles.languages.join(',') : 'all';
    args.push('--write-subs', '--sub-langs', languages, '--sub-format', input.subtitles.format);
  }

  if (input.nativeArchivePath) {
    args.push('--download-archive', input.nativeArchivePath);
  }

  // A single entry must not expand to its playlist; a playlist must not stop at a broken entry
  args.push(input.mode === 'playlist' ? '--ignore-errors' : '--no-playlist');

  if (input.userAgent) {
    args.push('--user-agent', input.userAgent);
  }

  args.push(...input.extraArgs);

  if (!input.extraArgs.includes(input.url)) {
    args.push(input.url);
  }

  return args;
}

/**
 * Build the argument list that lists a playlist's entries as JSON without downloading
 */
export function buildEnumerateArgs(url: string, cookieFile?: string, userAgent?: string | null): string[] {
  const args = ['--flat-playlist', '--dump-single-json', '--no-warnings'];

  if (cookieFile) {
    args.unshift('--cookies', cookieFile);
  }
  if (userAgent) {
    args.push('--user-agent', userAgent);
  }

  args.push(url);
  return args;
}
