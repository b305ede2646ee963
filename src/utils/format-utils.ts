const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KIB: 1024,
  MIB: 1024 ** 2,
  GIB: 1024 ** 3,
  TIB: 1024 ** 4,
  KB: 1000,
  MB: 1000 ** 2,
  GB: 1000 ** 3,
  TB: 1000 ** 4,
};

/**
 * Parse a size as the tool prints it ("145.41MiB", "~ 2.00GiB", "512B")
 *
 * @returns Size in bytes, or null if the text is not a size
 */
export function parseSize(text: string): number | null {
  const match = text.trim().match(/^~?\s*(\d+(?:\.\d+)?)\s*([KMGT]i?B|B)$/i);
  if (!match?.[1] || !match[2]) {
    return null;
  }

  const factor = SIZE_UNITS[match[2].toUpperCase()];
  if (factor === undefined) {
    return null;
  }

  return Math.round(Number.parseFloat(match[1]) * factor);
}

/**
 * Parse an ETA in `SS`, `MM:SS` or `HH:MM:SS` form
 *
 * @returns Seconds, or null for "Unknown", "N/A" and other non-numeric text
 */
export function parseEta(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+(:\d{1,2}){0,2}$/.test(trimmed)) {
    return null;
  }

  return trimmed.split(':').reduce((total, part) => total * 60 + Number.parseInt(part, 10), 0);
}

/**
 * Format a byte count with binary units ("1.5 MiB")
 */
export function formatSize(bytes: number | null, suffix = ''): string {
  if (bytes === null || !Number.isFinite(bytes) || bytes < 0) {
    return `0 B${suffix}`;
  }

  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(1)} ${units[unit]}${suffix}`;
}

/**
 * Format seconds as `MM:SS`, or `HH:MM:SS` past the hour.
 * Unknown or zero durations render as `--:--`.
 */
export function formatEta(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds <= 0) {
    return '--:--';
  }

  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');

  return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(secs)}` : `${pad(minutes)}:${pad(secs)}`;
}
