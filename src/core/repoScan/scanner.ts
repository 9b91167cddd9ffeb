import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, join, relative, resolve, sep } from 'node:path';
import { compareStrings } from '../../util/index.js';
import { ScanError, describeCause } from '../errors.js';
import type { AppLogger } from '../../logging.js';
import { extractFromConfig, extractFromEnv, extractFromSource, type Extracted } from './extract.js';
import { compareOccurrences, type Occurrence, type ScanResult, type Scanner, type TopicReference } from './types.js';

export const MAX_FILE_SIZE = 2 * 1024 * 1024;

export const SKIP_DIRS: ReadonlySet<string> = new Set([
  '.git',
  '.idea',
  '.vscode',
  '.venv',
  'node_modules',
  'vendor',
  'dist',
  'build',
  'target',
  'bin',
]);

type ScanMode = 'config' | 'env' | 'sourceCode';

const CONFIG_EXTENSIONS: ReadonlySet<string> = new Set(['.yaml', '.yml', '.json']);
const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set(['.go', '.py', '.java', '.ts', '.js']);

/** Pick the extractor for a file, or `null` to skip it. */
export function detectScanMode(path: string): ScanMode | null {
  const base = basename(path).toLowerCase();
  const ext = extname(base);
  if (base === '.env' || base.startsWith('.env.')) {
    return 'env';
  }
  if (CONFIG_EXTENSIONS.has(ext)) {
    return 'config';
  }
  if (SOURCE_EXTENSIONS.has(ext)) {
    return 'sourceCode';
  }
  return null;
}

function extract(mode: ScanMode, content: string): Extracted[] {
  switch (mode) {
    case 'config':
      return extractFromConfig(content);
    case 'env':
      return extractFromEnv(content);
    case 'sourceCode':
      return extractFromSource(content);
  }
}

export interface RepoScannerOptions {
  readonly maxFileSize?: number;
  readonly logger?: AppLogger;
}

/** Collects topic names referenced by config, env and source files under a directory. */
export class RepoScanner implements Scanner {
  private readonly maxFileSize: number;
  private readonly logger: AppLogger | undefined;

  constructor(options: RepoScannerOptions = {}) {
    this.maxFileSize = options.maxFileSize ?? MAX_FILE_SIZE;
    this.logger = options.logger;
  }

  async scan(rootPath: string): Promise<ScanResult> {
    const trimmed = rootPath.trim();
    if (trimmed === '') {
      throw new ScanError('repo path is required', 'not_found');
    }

    const root = resolve(trimmed);
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(root)).isDirectory();
    } catch (error: unknown) {
      throw new ScanError(`repo path "${trimmed}": ${describeCause(error)}`, 'not_found', error);
    }
    if (!isDirectory) {
      throw new ScanError(`repo path "${trimmed}" is not a directory`, 'not_found');
    }

    const occurrences = new Map<string, Map<string, Occurrence>>();
    let filesScanned = 0;

    for await (const file of this.walk(root)) {
      const relPath = relative(root, file.path).split(sep).join('/');
      let content: string;
      try {
        content = await readFile(file.path, 'utf-8');
      } catch (error: unknown) {
        throw new ScanError(`scan ${relPath}: ${describeCause(error)}`, 'io', error);
      }
      filesScanned++;

      for (const found of extract(file.mode, content)) {
        let byKey = occurrences.get(found.topic);
        if (byKey === undefined) {
          byKey = new Map();
          occurrences.set(found.topic, byKey);
        }
        const key = `${relPath}:${String(found.line)}:${found.source}`;
        if (!byKey.has(key)) {
          byKey.set(key, { file: relPath, line: found.line, source: found.source });
        }
      }
    }

    const topics = new Map<string, TopicReference>();
    for (const [topic, byKey] of occurrences) {
      topics.set(topic, { topic, occurrences: [...byKey.values()].sort(compareOccurrences) });
    }

    this.logger?.debug({ repoPath: root, filesScanned, topics: topics.size }, 'scanned repository');

    return { repoPath: root, filesScanned, topics };
  }

  private async *walk(dir: string): AsyncGenerator<{ path: string; mode: ScanMode }> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      throw new ScanError(`read directory "${dir}": ${describeCause(error)}`, 'io', error);
    });
    entries.sort((a, b) => compareStrings(a.name, b.name));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name.toLowerCase())) {
          yield* this.walk(path);
        }
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }
      const mode = detectScanMode(entry.name);
      if (mode === null) {
        continue;
      }
      let size: number;
      try {
        size = (await stat(path)).size;
      } catch (error: unknown) {
        throw new ScanError(`stat ${path}: ${describeCause(error)}`, 'io', error);
      }
      if (size > this.maxFileSize) {
        this.logger?.debug({ file: path, size }, 'skipping large file');
        continue;
      }
      yield { path, mode };
    }
  }
}
