export type {
  AuditResult,
  AuditSummary,
  ActiveTopicFinding,
  UnusedTopicFinding,
  RiskTier,
  ClusterHealthScore,
  CheckResult,
  CheckSummary,
  CheckFinding,
  CheckStatus,
  RunInfo,
} from './core/report/reportTypes.js';

export type {
  BrokerRecord,
  TopicRecord,
  ConsumerGroupRecord,
  ClusterMetadata,
  MetadataSource,
} from './core/cluster/types.js';

export type { Occurrence, OccurrenceSource, TopicReference, ScanResult, Scanner } from './core/repoScan/types.js';
export type { Config, OutputFormat } from './core/config/schema.js';
export type { TopicFilter } from './core/filter/excludeMatcher.js';
export type { AuditOptions } from './core/analysis/auditReconcile.js';
export type { KafkaConnectionOptions } from './core/cluster/inspector.js';

export {
  AuditError,
  ConfigParseError,
  ConfigReadError,
  InvalidPatternError,
  InvalidArgumentError,
  MetadataFetchError,
  ScanError,
  FindingsError,
} from './core/errors.js';

export { parseConfig } from './core/config/parse.js';
export { normalizeExcludePatterns, matchesExcludePattern } from './core/filter/excludeMatcher.js';
export { classifyRisk } from './core/analysis/classifyRisk.js';
export { reconcileAudit } from './core/analysis/auditReconcile.js';
export { reconcileCheck } from './core/analysis/checkReconcile.js';
export { KafkaInspector, createKafkaInspector } from './core/cluster/inspector.js';
export { RepoScanner } from './core/repoScan/scanner.js';
export { createLogger } from './logging.js';

import { reconcileAudit, type AuditOptions } from './core/analysis/auditReconcile.js';
import { reconcileCheck } from './core/analysis/checkReconcile.js';
import { describeCause } from './core/errors.js';
import type { ClusterMetadata, MetadataSource } from './core/cluster/types.js';
import type { TopicFilter } from './core/filter/excludeMatcher.js';
import type { Scanner } from './core/repoScan/types.js';
import type { AuditResult, CheckResult } from './core/report/reportTypes.js';
import { silentLogger, type AppLogger } from './logging.js';

/** Fetch one snapshot and always close the source afterwards. */
async function fetchAndClose(source: MetadataSource, logger: AppLogger): Promise<ClusterMetadata> {
  try {
    return await source.fetch();
  } finally {
    await source.close().catch((error: unknown) => {
      logger.warn({ err: describeCause(error) }, 'failed to close cluster connection');
    });
  }
}

/**
 * Audit a cluster for topics without consumer groups.
 * Exclude patterns must already be normalized.
 */
export async function audit(
  source: MetadataSource,
  options: AuditOptions,
  logger: AppLogger = silentLogger(),
): Promise<AuditResult> {
  const metadata = await fetchAndClose(source, logger);
  return reconcileAudit(metadata, options);
}

/**
 * Compare the topics a repository references against a cluster.
 * The cluster is read first, then the repository is scanned.
 */
export async function check(
  source: MetadataSource,
  scanner: Scanner,
  repoPath: string,
  filter: TopicFilter,
  logger: AppLogger = silentLogger(),
): Promise<CheckResult> {
  const metadata = await fetchAndClose(source, logger);
  const scan = await scanner.scan(repoPath);
  return reconcileCheck(scan, metadata, filter);
}
