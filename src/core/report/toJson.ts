import { compareStrings } from '../../util/index.js';
import type { AuditResult, CheckFinding, CheckResult } from './reportTypes.js';

/** Active topics are listed in JSON output only up to this many. */
export const MAX_ACTIVE_TOPICS_IN_JSON = 50;

/**
 * Serialize an AuditResult to a deterministic JSON string.
 * Keys are sorted for stable diffing.
 */
export function auditToJson(result: AuditResult, pretty: boolean): string {
  const { summary } = result;
  const data: Record<string, unknown> = {
    summary: {
      cluster_name: summary.clusterName,
      total_brokers: summary.totalBrokers,
      total_topics_including_internal: summary.totalTopicsIncludingInternal,
      total_topics_analyzed: summary.totalTopics,
      unused_topics: summary.unusedTopics,
      active_topics: summary.activeTopics,
      internal_topics_excluded: summary.internalTopics,
      unused_percentage: summary.unusedPercentage,
      total_partitions: summary.totalPartitions,
      unused_partitions: summary.unusedPartitions,
      active_partitions: summary.activePartitions,
      unused_partitions_percentage: summary.unusedPartitionsPercentage,
      total_consumer_groups: summary.totalConsumerGroups,
      high_risk_count: summary.highRiskCount,
      medium_risk_count: summary.mediumRiskCount,
      low_risk_count: summary.lowRiskCount,
      recommended_cleanup_topics: summary.recommendedCleanup,
      cluster_health_score: summary.clusterHealthScore,
      potential_savings_info: summary.potentialSavingsInfo,
    },
    unused_topics: result.unusedTopics.map((topic) => ({
      name: topic.name,
      partitions: topic.partitions,
      replication_factor: topic.replicationFactor,
      retention_ms: topic.retentionMs,
      retention_human: topic.retentionHuman,
      cleanup_policy: topic.cleanupPolicy,
      min_insync_replicas: topic.minInsyncReplicas,
      interesting_config: topic.interestingConfig,
      reason: topic.reason,
      recommendation: topic.recommendation,
      risk: topic.risk,
      cleanup_priority: topic.cleanupPriority,
    })),
    cluster_metadata: {
      brokers: result.metadata.brokers.map((broker) => ({
        id: broker.id,
        host: broker.host,
        port: broker.port,
      })),
      consumer_groups_count: result.metadata.consumerGroups.size,
      fetched_at: formatFetchedAt(result.metadata.fetchedAt),
    },
  };

  if (result.activeTopics.length > 0 && result.activeTopics.length <= MAX_ACTIVE_TOPICS_IN_JSON) {
    data['active_topics'] = result.activeTopics.map((topic) => ({
      name: topic.name,
      partitions: topic.partitions,
      replication_factor: topic.replicationFactor,
      consumer_groups: topic.consumerGroups,
      consumer_count: topic.consumerCount,
    }));
  }

  return serializeJson(data, pretty);
}

/** Serialize a CheckResult to a deterministic JSON string. */
export function checkToJson(result: CheckResult, pretty: boolean): string {
  const { summary } = result;
  return serializeJson(
    {
      summary: {
        repo_path: summary.repoPath,
        files_scanned: summary.filesScanned,
        repo_topics: summary.repoTopics,
        cluster_topics: summary.clusterTopics,
        total_findings: summary.totalFindings,
        ok_count: summary.okCount,
        missing_in_cluster_count: summary.missingInClusterCount,
        unreferenced_in_repo_count: summary.unreferencedInRepoCount,
        unused_count: summary.unusedCount,
      },
      findings: result.findings.map(checkFindingToJson),
    },
    pretty,
  );
}

function checkFindingToJson(finding: CheckFinding): Record<string, unknown> {
  const data: Record<string, unknown> = {
    topic: finding.topic,
    status: finding.status,
    referenced_in_repo: finding.referencedInRepo,
    in_cluster: finding.inCluster,
    reason: finding.reason,
  };
  if (finding.consumerGroups.length > 0) {
    data['consumer_groups'] = finding.consumerGroups;
  }
  if (finding.references.length > 0) {
    data['references'] = finding.references.map((ref) =>
      ref.line > 0 ? { file: ref.file, line: ref.line, source: ref.source } : { file: ref.file, source: ref.source },
    );
  }
  return data;
}

/** Stringify with keys sorted at every level. */
export function serializeJson(value: unknown, pretty: boolean): string {
  const sorted = sortKeysDeep(value);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatFetchedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/** Recursively sort object keys for deterministic output. */
function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => compareStrings(a, b));
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of entries) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}
