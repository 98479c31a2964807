import { access, readdir, readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import writeFileAtomic from 'write-file-atomic';

export interface WriteOptions {
  /** Keep the previous contents as `<file>.bak` */
  backup?: boolean;
}

/**
 * File access for build definitions, rooted at the project directory.
 */
export interface BuildFileStore {
  Exists(path: string): Promise<boolean>;

  /** Names of the regular files directly in `dir`, sorted; empty when it is missing. */
  List(dir: string): Promise<string[]>;

  /** Read a file; each path is read from disk at most once. */
  Read(path: string): Promise<string>;

  /** Replace a file's contents atomically. */
  Write(path: string, content: string, options?: WriteOptions): Promise<void>;
}

/**
 * {@link BuildFileStore} over the local file system.
 */
export class LocalBuildFileStore implements BuildFileStore {
  protected cache = new Map<string, string>();

  public constructor(protected root: string) {}

  public async Exists(path: string): Promise<boolean> {
    try {
      await access(this.resolve(path));
      return true;
    } catch {
      return false;
    }
  }

  public async List(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(this.resolve(dir), { withFileTypes: true });
      return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  public async Read(path: string): Promise<string> {
    const full = this.resolve(path);
    const cached = this.cache.get(full);
    if (cached !== undefined) return cached;

    const content = await readFile(full, 'utf8');
    this.cache.set(full, content);
    return content;
  }

  public async Write(
    path: string,
    content: string,
    options: WriteOptions = {},
  ): Promise<void> {
    const full = this.resolve(path);

    if (options.backup ?? true) {
      const previous = this.cache.get(full) ?? (await readFile(full, 'utf8'));
      await writeFileAtomic(`${full}.bak`, previous, { encoding: 'utf8' });
    }

    await writeFileAtomic(full, content, { encoding: 'utf8' });
    this.cache.set(full, content);
  }

  protected resolve(path: string): string {
    return isAbsolute(path) ? path : join(this.root, path);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
