import { compareStrings, formatTenths } from '../../util/index.js';
import type { ClusterHealthScore, UnusedTopicFinding } from '../report/reportTypes.js';

/** Cap on the recommended-cleanup list unless the caller picks another. */
export const DEFAULT_CLEANUP_LIMIT = 10;

/** `part / total` as a percentage, `0` when `total` is `0`. */
export function percent(part: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return (part / total) * 100;
}

/** Map the unused-topic percentage to a health label. */
export function clusterHealthScore(unusedPercentage: number): ClusterHealthScore {
  if (unusedPercentage <= 10) return 'excellent';
  if (unusedPercentage <= 25) return 'good';
  if (unusedPercentage <= 50) return 'fair';
  if (unusedPercentage <= 75) return 'poor';
  return 'critical';
}

/**
 * Names of the unused topics to clean up first: by cleanup priority, then
 * risk name, then topic name. A non-positive limit yields an empty list.
 */
export function recommendedCleanup(
  unused: readonly UnusedTopicFinding[],
  limit: number = DEFAULT_CLEANUP_LIMIT,
): string[] {
  if (unused.length === 0 || limit <= 0) {
    return [];
  }

  const ordered = [...unused].sort((a, b) => {
    if (a.cleanupPriority !== b.cleanupPriority) {
      return a.cleanupPriority - b.cleanupPriority;
    }
    if (a.risk !== b.risk) {
      return a.risk < b.risk ? -1 : 1;
    }
    return compareStrings(a.name, b.name);
  });

  return ordered.slice(0, limit).map((finding) => finding.name);
}

/** One-line summary of how much of the cluster the unused topics take up. */
export function potentialSavingsInfo(unusedTopics: number, unusedPartitions: number, totalPartitions: number): string {
  const share = formatTenths(percent(unusedPartitions, totalPartitions));
  return `${String(unusedTopics)} unused topics representing ${String(unusedPartitions)} partitions (${share}% of total partitions)`;
}

