import { compareStrings } from '../../util/index.js';

/** How an occurrence was detected. */
export type OccurrenceSource = 'config' | 'env' | 'sourceCode';

/** One place a topic name was found in the repository. */
export interface Occurrence {
  /** Slash-separated path relative to the scanned root. */
  readonly file: string;
  /** 1-based line, `0` when there is no line. */
  readonly line: number;
  readonly source: OccurrenceSource;
}

/** Order occurrences by file, then line, then source. */
export function compareOccurrences(a: Occurrence, b: Occurrence): number {
  if (a.file !== b.file) {
    return compareStrings(a.file, b.file);
  }
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return compareStrings(a.source, b.source);
}

/** Every occurrence of one topic name. */
export interface TopicReference {
  readonly topic: string;
  readonly occurrences: readonly Occurrence[];
}

/** Result of scanning a repository. */
export interface ScanResult {
  readonly repoPath: string;
  readonly filesScanned: number;
  readonly topics: ReadonlyMap<string, TopicReference>;
}

/** Anything that can scan a directory for topic references. */
export interface Scanner {
  scan(rootPath: string): Promise<ScanResult>;
}
