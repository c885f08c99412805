/**
 * File system utilities used by action steps
 */

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeFileSync,
} from 'fs';
import { glob } from 'glob';
import { basename, join } from 'path';

/**
 * Centralized file system helpers for action steps
 */
export class FileSystemUtils {
  /**
   * Remove a directory tree; missing directories are fine.
   */
  public static removeDirectory(dir: string): void {
    rmSync(dir, { recursive: true, force: true });
  }

  public static makeDirectory(dir: string): void {
    mkdirSync(dir, { recursive: true });
  }

  /**
   * Names of the regular files directly inside `dir`, sorted. A missing directory
   * lists as empty.
   */
  public static listFiles(dir: string): string[] {
    if (!existsSync(dir)) {
      return [];
    }
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * Names of the regular files in `dir` matching a glob pattern, sorted. A missing
   * directory matches nothing.
   */
  public static async findFiles(dir: string, pattern: string): Promise<string[]> {
    const matches = await glob(pattern, { cwd: dir, nodir: true });
    return matches.sort();
  }

  /**
   * Move a file into `targetDir`, keeping its name. Falls back to copy + unlink
   * when the directories live on different devices.
   */
  public static moveFile(source: string, targetDir: string): string {
    const destination = join(targetDir, basename(source));
    try {
      renameSync(source, destination);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        copyFileSync(source, destination);
        unlinkSync(source);
      } else {
        throw error;
      }
    }
    return destination;
  }

  public static writeTextFile(filePath: string, content: string): void {
    writeFileSync(filePath, content, 'utf-8');
  }

  public static exists(path: string): boolean {
    return existsSync(path);
  }
}
