/**
 * responseCache.ts: Write-once, content-addressed response bodies on disk.
 *
 * One file per entry, `<dir>/<fingerprint>.cache`, holding the raw body
 * bytes.  Entries are never invalidated or revalidated; deleting the
 * directory is the only way to force a re-fetch.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';

export class ResponseCache {
  private readonly dir: string;
  private dirReady = false;

  constructor(dir: string) {
    this.dir = dir;
  }

  pathFor(fingerprint: string): string {
    return join(this.dir, `${fingerprint}.cache`);
  }

  /** The cached body, or null on a miss. */
  async read(fingerprint: string): Promise<Buffer | null> {
    try {
      return await readFile(this.pathFor(fingerprint));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async write(fingerprint: string, body: Buffer): Promise<void> {
    if (!this.dirReady) {
      await mkdir(this.dir, { recursive: true });
      this.dirReady = true;
    }
    await writeFile(this.pathFor(fingerprint), body);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
