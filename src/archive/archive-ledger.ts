import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, writeFileSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../utils/logger.js';

/**
 * Persisted set of identifiers of items that finished downloading
 *
 * The file is plain text with one identifier per line. It is read in full by
 * `load` and only ever appended to afterwards; each append is flushed to disk
 * before it returns, so a crash loses at most the item in flight.
 *
 * Single writer: only the running session touches the file.
 */
export class ArchiveLedger {
  private path: string | null = null;
  private ids: Set<string> = new Set();
  private fd: number | null = null;

  /**
   * Read the ledger file
   *
   * A missing file is an empty ledger. Blank lines, `#` comments and
   * corrupt lines are skipped.
   *
   * @returns Identifiers currently recorded
   */
  load(path: string): ReadonlySet<string> {
    this.close();
    this.path = path;
    this.ids = new Set();

    if (!existsSync(path)) {
      return this.ids;
    }

    const content = readFileSync(path, 'utf-8');
    let skipped = 0;

    for (const rawLine of content.split('\n')) {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) {
        continue;
      }
      if (!isValidIdentifier(line)) {
        skipped++;
        continue;
      }
      this.ids.add(line);
    }

    if (skipped > 0) {
      logger.warning(`Skipped ${skipped} corrupt line(s) in ${path}`);
    }

    return this.ids;
  }

  contains(id: string): boolean {
    return this.ids.has(id.trim());
  }

  /**
   * Record an identifier and flush it to disk
   *
   * Appending an identifier that is already recorded is a no-op.
   */
  append(id: string): void {
    const entry = id.trim();
    if (!isValidIdentifier(entry)) {
      throw new Error(`Invalid ledger identifier: ${JSON.stringify(id)}`);
    }
    if (this.ids.has(entry)) {
      return;
    }

    const fd = this.acquire();
    writeSync(fd, `${entry}\n`);
    fsyncSync(fd);
    this.ids.add(entry);
  }

  /**
   * Forget every recorded identifier, so everything is downloaded again
   */
  clear(): void {
    const path = this.requirePath();
    this.close();
    if (existsSync(path)) {
      writeFileSync(path, '', 'utf-8');
    }
    this.ids = new Set();
  }

  /**
   * Release the file handle. Safe to call more than once.
   */
  close(): void {
    if (this.fd !== null) {
      const fd = this.fd;
      this.fd = null;
      closeSync(fd);
    }
  }

  get size(): number {
    return this.ids.size;
  }

  private acquire(): number {
    if (this.fd === null) {
      const path = this.requirePath();
      mkdirSync(dirname(path), { recursive: true });
      this.fd = openSync(path, 'a');
    }
    return this.fd;
  }

  private requirePath(): string {
    if (this.path === null) {
      throw new Error('Ledger not loaded. Call load() first.');
    }
    return this.path;
  }
}

/**
 * A usable identifier is one line of printable text
 */
function isValidIdentifier(id: string): boolean {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: Control characters mark a torn or binary line
  return id.length > 0 && id.length <= 2048 && !/[\x00-\x1F\x7F\uFFFD]/.test(id);
}
