import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Tracks temporary directories created by a test file so they can be
 * removed in `afterEach`
 */
export class TempDirs {
  private dirs: string[] = [];

  constructor(private prefix: string = 'jetshards-test-') {}

  /**
   * Create a fresh, empty directory under the OS temp dir
   */
  async create(): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), this.prefix));
    this.dirs.push(dir);
    return dir;
  }

  /**
   * Remove every directory created so far
   */
  async cleanup(): Promise<void> {
    const dirs = this.dirs;
    this.dirs = [];
    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
  }
}
