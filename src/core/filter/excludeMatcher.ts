import { InvalidPatternError } from '../errors.js';
import { GlobSyntaxError, globMatch } from './glob.js';

/** Name every pattern is test-matched against during validation. */
const VALIDATION_SENTINEL = 'topic';

/**
 * Trim patterns, drop blanks and validate the rest.
 * Throws {@link InvalidPatternError} naming the first malformed pattern.
 */
export function normalizeExcludePatterns(patterns: readonly string[]): readonly string[] {
  const normalized: string[] = [];

  for (const raw of patterns) {
    const pattern = raw.trim();
    if (pattern === '') {
      continue;
    }

    try {
      globMatch(pattern, VALIDATION_SENTINEL);
    } catch (error: unknown) {
      if (error instanceof GlobSyntaxError) {
        throw new InvalidPatternError(pattern, error.message);
      }
      throw error;
    }

    normalized.push(pattern);
  }

  return normalized;
}

/**
 * Whether any pattern matches the topic name.
 * A malformed pattern counts as not matching.
 */
export function matchesExcludePattern(topic: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    try {
      return globMatch(pattern, topic);
    } catch (error: unknown) {
      if (error instanceof GlobSyntaxError) {
        return false;
      }
      throw error;
    }
  });
}

/** Topics prefixed with a double underscore are internal bookkeeping topics. */
export function isInternalTopic(name: string): boolean {
  return name.startsWith('__');
}

/** Options shared by both reconcilers for dropping topics from analysis. */
export interface TopicFilter {
  readonly excludeInternal: boolean;
  readonly excludePatterns: readonly string[];
}

/** Whether a topic survives the internal and name-pattern filters. */
export function isTopicIncluded(name: string, internal: boolean, filter: TopicFilter): boolean {
  if (internal && filter.excludeInternal) {
    return false;
  }
  return !matchesExcludePattern(name, filter.excludePatterns);
}
