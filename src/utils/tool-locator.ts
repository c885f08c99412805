import { accessSync, constants, statSync } from 'fs';
import { delimiter, isAbsolute, join } from 'path';

/**
 * Resolves program names to executable paths. Results are cached per instance,
 * so one configuration pass looks each name up at most once.
 */
export interface ToolLocator {
  /** First candidate found on the search path, in preference order. */
  find(names: readonly string[]): string | undefined;
}

export interface PathToolLocatorOptions {
  searchPath?: string;
  platform?: NodeJS.Platform;
  pathExt?: string;
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class PathToolLocator implements ToolLocator {
  private readonly directories: string[];
  private readonly extensions: string[];
  private readonly cache = new Map<string, string | null>();

  constructor(options: PathToolLocatorOptions = {}) {
    const searchPath = options.searchPath ?? process.env.PATH ?? '';
    const platform = options.platform ?? process.platform;
    this.directories = searchPath.split(delimiter).filter((dir) => dir.length > 0);
    this.extensions =
      platform === 'win32'
        ? ['', ...(options.pathExt ?? process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')]
        : [''];
  }

  find(names: readonly string[]): string | undefined {
    for (const name of names) {
      const found = this.lookup(name);
      if (found) return found;
    }
    return undefined;
  }

  private lookup(name: string): string | undefined {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    const found =
      isAbsolute(name) || name.includes('/')
        ? isExecutableFile(name)
          ? name
          : null
        : this.searchDirectories(name);

    this.cache.set(name, found);
    return found ?? undefined;
  }

  private searchDirectories(name: string): string | null {
    for (const dir of this.directories) {
      for (const ext of this.extensions) {
        const candidate = join(dir, `${name}${ext}`);
        if (isExecutableFile(candidate)) {
          return candidate;
        }
      }
    }
    return null;
  }
}

/** Locator backed by a fixed table, for callers that already know where tools live. */
export class StaticToolLocator implements ToolLocator {
  constructor(private readonly tools: Readonly<Record<string, string>>) {}

  find(names: readonly string[]): string | undefined {
    for (const name of names) {
      const path = this.tools[name];
      if (path) return path;
    }
    return undefined;
  }
}
