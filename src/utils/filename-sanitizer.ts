/**
 * Name used when nothing printable is left of a title
 */
export const FALLBACK_NAME = 'Untitled';

/**
 * Longest name kept, in UTF-8 bytes. File systems allow 255; the rest is left
 * for the index prefix and the extensions the tool appends (`.f137.mp4.part`).
 */
export const MAX_NAME_BYTES = 200;

/**
 * Make a title safe to use as a single path segment on every platform.
 * Windows rules are the strictest, so they are the ones applied.
 *
 * The result is stable: sanitizing an already sanitized name returns it unchanged.
 */
export function sanitizeFilename(name: string): string {
  const collapsed = name
    // Windows reserved characters: < > : " / \ | ? *
    .replace(/[<>:"/\\|?*]/g, '_')
    // biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to strip control characters
    .replace(/[\x00-\x1F\x7F]/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  // Windows drops trailing dots and spaces silently
  const cleaned = truncateBytes(collapsed, MAX_NAME_BYTES).replace(/[\s.]+$/, '');

  if (cleaned === '') {
    return FALLBACK_NAME;
  }

  return cleaned;
}

/**
 * Cut text to at most maxBytes of UTF-8 without splitting a character
 */
function truncateBytes(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) {
    return text;
  }

  let result = '';
  let bytes = 0;
  for (const char of text) {
    bytes += Buffer.byteLength(char, 'utf8');
    if (bytes > maxBytes) {
      break;
    }
    result += char;
  }
  return result;
}
