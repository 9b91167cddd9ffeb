import { sortBy, sortedValues } from '../../util/index.js';
import type { ClusterMetadata, ConsumerGroupRecord, TopicRecord } from '../cluster/types.js';
import { isTopicIncluded, type TopicFilter } from '../filter/excludeMatcher.js';
import type { ActiveTopicFinding, AuditResult, UnusedTopicFinding } from '../report/reportTypes.js';
import {
  DEFAULT_CLEANUP_LIMIT,
  clusterHealthScore,
  percent,
  potentialSavingsInfo,
  recommendedCleanup,
} from './aggregate.js';
import { classifyRisk, filterInterestingConfig, formatRetention, recommendationForRisk } from './classifyRisk.js';

const UNUSED_REASON = 'No consumer groups found';

/**
 * Map every topic to the sorted ids of the groups that committed offsets on it.
 * Topics no group consumes are absent.
 */
export function buildConsumersByTopic(
  consumerGroups: ReadonlyMap<string, ConsumerGroupRecord>,
): Map<string, readonly string[]> {
  const groupsByTopic = new Map<string, Set<string>>();

  for (const group of consumerGroups.values()) {
    for (const topic of group.topics) {
      let groups = groupsByTopic.get(topic);
      if (groups === undefined) {
        groups = new Set();
        groupsByTopic.set(topic, groups);
      }
      groups.add(group.groupId);
    }
  }

  const result = new Map<string, readonly string[]>();
  for (const [topic, groups] of groupsByTopic) {
    result.set(topic, sortedValues(groups));
  }
  return result;
}

/** Build the finding for a topic nobody consumes. */
export function buildUnusedTopic(topic: TopicRecord, reason: string): UnusedTopicFinding {
  const { risk, priority } = classifyRisk(topic.partitions, topic.replicationFactor);
  const retentionMs = topic.config['retention.ms'] ?? '';

  return {
    name: topic.name,
    partitions: topic.partitions,
    replicationFactor: topic.replicationFactor,
    retentionMs,
    retentionHuman: formatRetention(retentionMs),
    cleanupPolicy: topic.config['cleanup.policy'] ?? '',
    minInsyncReplicas: topic.config['min.insync.replicas'] ?? '',
    interestingConfig: filterInterestingConfig(topic.config),
    reason,
    recommendation: recommendationForRisk(risk),
    risk,
    cleanupPriority: priority,
  };
}

/** Topic filters plus the length of the recommended-cleanup list. */
export interface AuditOptions extends TopicFilter {
  readonly cleanupLimit?: number;
}

/**
 * Split the cluster's topics into unused and active, after dropping internal
 * topics (when asked) and topics matching an exclude pattern.
 */
export function reconcileAudit(metadata: ClusterMetadata, options: AuditOptions): AuditResult {
  const consumersByTopic = buildConsumersByTopic(metadata.consumerGroups);

  const unused: UnusedTopicFinding[] = [];
  const active: ActiveTopicFinding[] = [];
  let internalObserved = 0;
  let totalPartitions = 0;
  let unusedPartitions = 0;
  let highRiskCount = 0;
  let mediumRiskCount = 0;
  let lowRiskCount = 0;

  for (const topic of metadata.topics.values()) {
    if (topic.internal) {
      internalObserved++;
    }
    if (!isTopicIncluded(topic.name, topic.internal, options)) {
      continue;
    }

    totalPartitions += topic.partitions;

    const groups = consumersByTopic.get(topic.name) ?? [];
    if (groups.length === 0) {
      const finding = buildUnusedTopic(topic, UNUSED_REASON);
      unused.push(finding);
      unusedPartitions += topic.partitions;
      switch (finding.risk) {
        case 'high':
          highRiskCount++;
          break;
        case 'medium':
          mediumRiskCount++;
          break;
        case 'low':
          lowRiskCount++;
          break;
      }
      continue;
    }

    active.push({
      name: topic.name,
      partitions: topic.partitions,
      replicationFactor: topic.replicationFactor,
      consumerGroups: groups,
      consumerCount: groups.length,
    });
  }

  const unusedTopics = sortBy(unused, (t) => t.name);
  const activeTopics = sortBy(active, (t) => t.name);
  const totalTopics = unusedTopics.length + activeTopics.length;
  const unusedPercentage = percent(unusedTopics.length, totalTopics);

  return {
    summary: {
      clusterName: metadata.brokers[0]?.host ?? 'unknown',
      totalBrokers: metadata.brokers.length,
      totalTopicsIncludingInternal: metadata.topics.size,
      totalTopics,
      unusedTopics: unusedTopics.length,
      activeTopics: activeTopics.length,
      internalTopics: options.excludeInternal ? internalObserved : 0,
      unusedPercentage,
      totalPartitions,
      unusedPartitions,
      activePartitions: totalPartitions - unusedPartitions,
      unusedPartitionsPercentage: percent(unusedPartitions, totalPartitions),
      totalConsumerGroups: metadata.consumerGroups.size,
      highRiskCount,
      mediumRiskCount,
      lowRiskCount,
      recommendedCleanup: recommendedCleanup(unusedTopics, options.cleanupLimit ?? DEFAULT_CLEANUP_LIMIT),
      clusterHealthScore: clusterHealthScore(unusedPercentage),
      potentialSavingsInfo: potentialSavingsInfo(unusedTopics.length, unusedPartitions, totalPartitions),
    },
    unusedTopics,
    activeTopics,
    metadata,
    internalObserved,
  };
}
