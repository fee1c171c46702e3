/**
 * Download Archive
 *
 * Persistent set of asset identifiers that have already been delivered.
 * The backing file holds one id per line and is only ever appended to;
 * each append is flushed to disk before `add` resolves.
 */

import {
  appendLineDurable,
  ConcurrencyLimiter,
  createLogger,
  safeReadFile,
} from '@mediafetch/utils';

const log = createLogger({ component: 'archive' });

/**
 * The form an id is stored and looked up under, or null when it cannot be
 * stored as a single line
 */
export function normalizeArchiveId(id: string): string | null {
  const entry = id.trim();
  if (!entry || /[\r\n]/.test(entry)) {
    return null;
  }
  return entry;
}

export class DownloadArchive {
  private readonly ids: Set<string>;
  private readonly filePath: string | null;
  private readonly writeLock = new ConcurrencyLimiter(1);

  /**
   * Use `DownloadArchive.open()` to hydrate from disk. Constructing with no
   * path gives an archive that lives only in memory.
   */
  constructor(filePath: string | null = null, ids: Iterable<string> = []) {
    this.filePath = filePath;
    this.ids = new Set(ids);
  }

  static async open(filePath: string): Promise<DownloadArchive> {
    const content = await safeReadFile(filePath);
    const archive = new DownloadArchive(filePath, parseArchive(content ?? ''));

    log.info({ path: filePath, entries: archive.size }, content === null
      ? 'Starting new download archive'
      : 'Loaded download archive');

    return archive;
  }

  /**
   * Whether entries are persisted anywhere
   */
  get enabled(): boolean {
    return this.filePath !== null;
  }

  get path(): string | null {
    return this.filePath;
  }

  get size(): number {
    return this.ids.size;
  }

  get isEmpty(): boolean {
    return this.ids.size === 0;
  }

  contains(id: string): boolean {
    const entry = normalizeArchiveId(id);
    return entry !== null && this.ids.has(entry);
  }

  /**
   * Record an id. Adding an id that is already present writes nothing.
   */
  async add(id: string): Promise<void> {
    const entry = normalizeArchiveId(id);
    if (entry === null) {
      throw new RangeError(`Invalid archive entry: ${JSON.stringify(id)}`);
    }

    await this.writeLock.execute(async () => {
      if (this.ids.has(entry)) {
        return;
      }
      if (this.filePath) {
        await appendLineDurable(this.filePath, entry);
      }
      this.ids.add(entry);
    });
  }
}

function parseArchive(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
