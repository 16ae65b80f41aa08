import { mkdir, access, constants } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve, isAbsolute, sep } from 'node:path';

/**
 * Default workspace root directory, under the user's home
 */
const DEFAULT_WORKSPACE_ROOT = '.toolloop';

const WORKSPACE_DIRS = ['logs', 'transcripts'] as const;

function assertPlainName(kind: string, name: string): void {
  if (name.length === 0 || name.includes('/') || name.includes('\\') || name.includes('..')) {
    throw new Error(`Invalid ${kind}: ${name}`);
  }
}

/**
 * Expands a leading `~` to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Workspace - Manages the ~/.toolloop/ directory
 *
 * Holds `config.json`, `logs/` and saved run transcripts under
 * `transcripts/`. Every path it hands out stays inside the root.
 */
export class Workspace {
  private readonly rootPath: string;

  /**
   * @param rootPath - Custom root path (defaults to ~/.toolloop/)
   */
  constructor(rootPath?: string) {
    if (rootPath) {
      const expanded = expandHome(rootPath);
      this.rootPath = isAbsolute(expanded) ? expanded : resolve(expanded);
    } else {
      this.rootPath = join(homedir(), DEFAULT_WORKSPACE_ROOT);
    }
  }

  get root(): string {
    return this.rootPath;
  }

  /**
   * Creates the root and its standard subdirectories, owner-only (700)
   */
  async initialize(): Promise<void> {
    await mkdir(this.rootPath, { recursive: true, mode: 0o700 });

    for (const dir of WORKSPACE_DIRS) {
      await mkdir(join(this.rootPath, dir), { recursive: true, mode: 0o700 });
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.rootPath, constants.F_OK);
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Resolves a path relative to the workspace root
   * @throws Error if the resolved path escapes the workspace
   */
  resolve(relativePath: string): string {
    const absolutePath = resolve(this.rootPath, relativePath);

    if (!this.contains(absolutePath)) {
      throw new Error(`Path "${relativePath}" resolves outside workspace boundary`);
    }

    return absolutePath;
  }

  contains(absolutePath: string): boolean {
    const normalizedRoot = resolve(this.rootPath);
    const normalizedPath = resolve(absolutePath);

    if (!normalizedPath.startsWith(normalizedRoot)) {
      return false;
    }

    // Rejects sibling prefixes such as ~/.toolloop2
    const remainder = normalizedPath.slice(normalizedRoot.length);
    return remainder.length === 0 || remainder.startsWith(sep);
  }

  get configPath(): string {
    return join(this.rootPath, 'config.json');
  }

  get logsDir(): string {
    return join(this.rootPath, 'logs');
  }

  get transcriptsDir(): string {
    return join(this.rootPath, 'transcripts');
  }

  /**
   * Path of the JSON-lines transcript for a run
   */
  transcriptPath(runId: string): string {
    assertPlainName('run ID', runId);
    return this.resolve(join('transcripts', `${runId}.jsonl`));
  }
}
