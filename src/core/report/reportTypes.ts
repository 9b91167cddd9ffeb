import type { ClusterMetadata } from '../cluster/types.js';
import type { Occurrence } from '../repoScan/types.js';

/** Deletion risk tier of an unused topic. */
export type RiskTier = 'low' | 'medium' | 'high';

/** Health label derived from the unused-topic percentage. */
export type ClusterHealthScore = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';

/** A cluster topic with no consumer groups attached. */
export interface UnusedTopicFinding {
  readonly name: string;
  readonly partitions: number;
  readonly replicationFactor: number;
  /** Raw `retention.ms`, empty when unknown. */
  readonly retentionMs: string;
  readonly retentionHuman: string;
  readonly cleanupPolicy: string;
  readonly minInsyncReplicas: string;
  readonly interestingConfig: Readonly<Record<string, string>>;
  readonly reason: string;
  readonly recommendation: string;
  readonly risk: RiskTier;
  /** Lower cleans up first. */
  readonly cleanupPriority: number;
}

/** A cluster topic with at least one consumer group. */
export interface ActiveTopicFinding {
  readonly name: string;
  readonly partitions: number;
  readonly replicationFactor: number;
  readonly consumerGroups: readonly string[];
  readonly consumerCount: number;
}

/** Roll-up numbers for an audit run. */
export interface AuditSummary {
  readonly clusterName: string;
  readonly totalBrokers: number;

  readonly totalTopicsIncludingInternal: number;
  readonly totalTopics: number;
  readonly unusedTopics: number;
  readonly activeTopics: number;
  /** Internal topics dropped from analysis; 0 unless internal topics are excluded. */
  readonly internalTopics: number;
  readonly unusedPercentage: number;

  readonly totalPartitions: number;
  readonly unusedPartitions: number;
  readonly activePartitions: number;
  readonly unusedPartitionsPercentage: number;

  readonly totalConsumerGroups: number;

  readonly highRiskCount: number;
  readonly mediumRiskCount: number;
  readonly lowRiskCount: number;

  readonly recommendedCleanup: readonly string[];
  readonly clusterHealthScore: ClusterHealthScore;
  readonly potentialSavingsInfo: string;
}

/** The complete audit result. */
export interface AuditResult {
  readonly summary: AuditSummary;
  readonly unusedTopics: readonly UnusedTopicFinding[];
  readonly activeTopics: readonly ActiveTopicFinding[];
  readonly metadata: ClusterMetadata;
  /** Internal topics seen in the snapshot, excluded or not. */
  readonly internalObserved: number;
}

/** How a topic compares between repository and cluster. */
export type CheckStatus = 'MISSING_IN_CLUSTER' | 'UNUSED' | 'UNREFERENCED_IN_REPO' | 'OK';

/** Statuses in report order, most severe first. */
export const CHECK_STATUS_ORDER: readonly CheckStatus[] = [
  'MISSING_IN_CLUSTER',
  'UNUSED',
  'UNREFERENCED_IN_REPO',
  'OK',
];

/** Comparison details for one topic name. */
export interface CheckFinding {
  readonly topic: string;
  readonly status: CheckStatus;
  readonly referencedInRepo: boolean;
  readonly inCluster: boolean;
  readonly consumerGroups: readonly string[];
  readonly references: readonly Occurrence[];
  readonly reason: string;
}

/** Roll-up numbers for a check run. */
export interface CheckSummary {
  readonly repoPath: string;
  readonly filesScanned: number;
  readonly repoTopics: number;
  readonly clusterTopics: number;
  readonly totalFindings: number;
  readonly okCount: number;
  readonly missingInClusterCount: number;
  readonly unreferencedInRepoCount: number;
  readonly unusedCount: number;
}

/** The complete check result. */
export interface CheckResult {
  readonly summary: CheckSummary;
  readonly findings: readonly CheckFinding[];
  readonly metadata: ClusterMetadata;
}

/** Stamps attached to a run for envelopes that carry them. */
export interface RunInfo {
  readonly version: string;
  /** ISO-8601, or `null` when timestamps are suppressed. */
  readonly timestamp: string | null;
  readonly bootstrapServers: string;
}
