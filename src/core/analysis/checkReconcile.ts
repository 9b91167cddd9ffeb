import { compareStrings, sortedValues } from '../../util/index.js';
import type { ClusterMetadata, TopicRecord } from '../cluster/types.js';
import { isInternalTopic, isTopicIncluded, type TopicFilter } from '../filter/excludeMatcher.js';
import { compareOccurrences, type ScanResult, type TopicReference } from '../repoScan/types.js';
import { buildConsumersByTopic } from './auditReconcile.js';
import { CHECK_STATUS_ORDER, type CheckFinding, type CheckResult, type CheckStatus } from '../report/reportTypes.js';

interface Classification {
  readonly status: CheckStatus;
  readonly reason: string;
}

/** Decide the status of one topic name. The first matching rule wins. */
export function classifyCheckStatus(referencedInRepo: boolean, inCluster: boolean, hasConsumers: boolean): Classification {
  if (referencedInRepo && !inCluster) {
    return {
      status: 'MISSING_IN_CLUSTER',
      reason: 'topic is referenced in code but does not exist in cluster',
    };
  }
  if (inCluster && !hasConsumers) {
    return {
      status: 'UNUSED',
      reason: referencedInRepo
        ? 'topic is referenced in code and exists in cluster but has no active consumer groups'
        : 'topic exists in cluster but has no active consumer groups',
    };
  }
  if (!referencedInRepo && inCluster) {
    return {
      status: 'UNREFERENCED_IN_REPO',
      reason: 'topic exists in cluster with consumers but was not found in repository',
    };
  }
  return { status: 'OK', reason: 'topic exists in cluster and has active consumers' };
}

/** Sort rank of a status: most severe first. */
export function checkStatusRank(status: CheckStatus): number {
  return CHECK_STATUS_ORDER.indexOf(status);
}

/**
 * Compare the topics a repository references with the topics the cluster has.
 * Both sides are filtered by the same rules; every surviving name yields one finding.
 */
export function reconcileCheck(scan: ScanResult, metadata: ClusterMetadata, filter: TopicFilter): CheckResult {
  const consumersByTopic = buildConsumersByTopic(metadata.consumerGroups);

  const repoTopics = new Map<string, TopicReference>();
  for (const [name, reference] of scan.topics) {
    if (isTopicIncluded(name, isInternalTopic(name), filter)) {
      repoTopics.set(name, reference);
    }
  }

  const clusterTopics = new Map<string, TopicRecord>();
  for (const [name, topic] of metadata.topics) {
    if (isTopicIncluded(name, topic.internal, filter)) {
      clusterTopics.set(name, topic);
    }
  }

  const names = sortedValues(new Set([...repoTopics.keys(), ...clusterTopics.keys()]));

  const findings: CheckFinding[] = names.map((topic) => {
    const reference = repoTopics.get(topic);
    const inCluster = clusterTopics.has(topic);
    const consumerGroups = inCluster ? consumersByTopic.get(topic) ?? [] : [];
    const { status, reason } = classifyCheckStatus(reference !== undefined, inCluster, consumerGroups.length > 0);

    return {
      topic,
      status,
      referencedInRepo: reference !== undefined,
      inCluster,
      consumerGroups,
      references: reference !== undefined ? [...reference.occurrences].sort(compareOccurrences) : [],
      reason,
    };
  });

  findings.sort((a, b) => {
    const rank = checkStatusRank(a.status) - checkStatusRank(b.status);
    return rank !== 0 ? rank : compareStrings(a.topic, b.topic);
  });

  const countOf = (status: CheckStatus): number => findings.filter((f) => f.status === status).length;

  return {
    summary: {
      repoPath: scan.repoPath,
      filesScanned: scan.filesScanned,
      repoTopics: repoTopics.size,
      clusterTopics: clusterTopics.size,
      totalFindings: findings.length,
      okCount: countOf('OK'),
      missingInClusterCount: countOf('MISSING_IN_CLUSTER'),
      unreferencedInRepoCount: countOf('UNREFERENCED_IN_REPO'),
      unusedCount: countOf('UNUSED'),
    },
    findings,
    metadata,
  };
}
