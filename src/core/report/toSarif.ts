import { posix } from 'node:path';
import { pathToFileURL } from 'node:url';
import { compareStrings } from '../../util/index.js';
import type { Occurrence } from '../repoScan/types.js';
import type { AuditResult, CheckResult, CheckStatus, RiskTier } from './reportTypes.js';
import { serializeJson } from './toJson.js';

const SARIF_SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json';
const SARIF_VERSION = '2.1.0';
const SRCROOT_BASE_ID = '%SRCROOT%';

export const SARIF_TOOL_NAME = 'kafka-topic-audit';

type SarifLevel = 'error' | 'warning' | 'note';

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly fullDescription: { readonly text: string };
  readonly defaultConfiguration: { readonly level: SarifLevel };
  readonly properties: { readonly tags: readonly string[] };
}

interface SarifLocation {
  readonly physicalLocation: {
    readonly artifactLocation: { readonly uri: string; readonly uriBaseId: string };
    readonly region?: { readonly startLine: number };
  };
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations?: readonly SarifLocation[];
  readonly partialFingerprints: Readonly<Record<string, string>>;
  readonly properties: Readonly<Record<string, unknown>>;
  /** Sort key only; not serialized. */
  readonly topic: string;
}

interface SarifRun {
  readonly tool: { readonly driver: { readonly name: string; readonly rules: readonly SarifRule[] } };
  readonly results: readonly SarifResult[];
  readonly originalUriBaseIds?: Readonly<Record<string, { readonly uri: string }>>;
}

const ruleId = (code: string): string => `${SARIF_TOOL_NAME}/${code}`;

function rule(code: string, name: string, short: string, full: string, level: SarifLevel, tags: readonly string[]): SarifRule {
  return {
    id: ruleId(code),
    name,
    shortDescription: { text: short },
    fullDescription: { text: full },
    defaultConfiguration: { level },
    properties: { tags },
  };
}

const MISSING_IN_CLUSTER_RULE = rule(
  'MISSING_IN_CLUSTER',
  'Missing topic in cluster',
  'Topic is referenced in repository but missing in Kafka cluster',
  'The repository references a topic that was not found in the target cluster metadata.',
  'error',
  ['kafka', 'reliability', 'configuration'],
);

const UNUSED_TOPIC_RULE = rule(
  'UNUSED_TOPIC',
  'Unused Kafka topic',
  'Topic has no active consumer groups',
  'The topic exists in Kafka but no active consumer groups are currently attached.',
  'warning',
  ['kafka', 'cleanup', 'cost'],
);

const UNREFERENCED_IN_REPO_RULE = rule(
  'UNREFERENCED_IN_REPO',
  'Unreferenced topic in repository',
  'Topic exists in Kafka but was not found in repository scan',
  'The topic appears to be active in Kafka but has no references in scanned files.',
  'warning',
  ['kafka', 'drift', 'inventory'],
);

const HIGH_RISK_RULE = rule(
  'HIGH_RISK_TOPIC',
  'High-risk unused topic',
  'Unused topic classified as high risk',
  'Unused topic has high cleanup risk based on partition count or replication settings.',
  'error',
  ['kafka', 'cleanup', 'high-risk'],
);

const MEDIUM_RISK_RULE = rule(
  'MEDIUM_RISK_TOPIC',
  'Medium-risk unused topic',
  'Unused topic classified as medium risk',
  'Unused topic has medium cleanup risk and should be reviewed before deletion.',
  'warning',
  ['kafka', 'cleanup', 'medium-risk'],
);

const LOW_RISK_RULE = rule(
  'LOW_RISK_TOPIC',
  'Low-risk unused topic',
  'Unused topic classified as low risk',
  'Unused topic has low cleanup risk and can usually be removed after confirmation.',
  'note',
  ['kafka', 'cleanup', 'low-risk'],
);

const CHECK_RULES: Readonly<Record<Exclude<CheckStatus, 'OK'>, SarifRule>> = {
  MISSING_IN_CLUSTER: MISSING_IN_CLUSTER_RULE,
  UNUSED: UNUSED_TOPIC_RULE,
  UNREFERENCED_IN_REPO: UNREFERENCED_IN_REPO_RULE,
};

const AUDIT_RULES: Readonly<Record<RiskTier, SarifRule>> = {
  high: HIGH_RISK_RULE,
  medium: MEDIUM_RISK_RULE,
  low: LOW_RISK_RULE,
};

/**
 * Serialize a CheckResult as a SARIF 2.1.0 log.
 * OK findings produce no result.
 */
export function checkToSarif(result: CheckResult, pretty: boolean): string {
  const results: SarifResult[] = [];

  for (const finding of result.findings) {
    if (finding.status === 'OK') {
      continue;
    }
    const matched = CHECK_RULES[finding.status];
    const properties: Record<string, unknown> = {
      topic: finding.topic,
      status: finding.status,
      referenced_in_repo: finding.referencedInRepo,
      in_cluster: finding.inCluster,
      reference_count: finding.references.length,
    };
    if (finding.consumerGroups.length > 0) {
      properties['consumer_groups'] = finding.consumerGroups;
    }

    const locations = locationsFromReferences(finding.references);
    results.push({
      ruleId: matched.id,
      level: matched.defaultConfiguration.level,
      message: { text: `${finding.topic}: ${finding.reason}` },
      ...(locations.length > 0 ? { locations } : {}),
      partialFingerprints: { topicStatus: `${finding.topic}|${finding.status}` },
      properties,
      topic: finding.topic,
    });
  }

  const run: SarifRun = {
    tool: { driver: { name: SARIF_TOOL_NAME, rules: [MISSING_IN_CLUSTER_RULE, UNUSED_TOPIC_RULE, UNREFERENCED_IN_REPO_RULE] } },
    results: sortResults(results),
    ...(result.summary.repoPath.trim() !== ''
      ? { originalUriBaseIds: { [SRCROOT_BASE_ID]: { uri: directoryUri(result.summary.repoPath) } } }
      : {}),
  };

  return serializeLog(run, pretty);
}

/** Serialize an AuditResult's unused topics as a SARIF 2.1.0 log, one rule per risk tier. */
export function auditToSarif(result: AuditResult, pretty: boolean): string {
  const results: SarifResult[] = result.unusedTopics.map((topic) => {
    const matched = AUDIT_RULES[topic.risk];
    return {
      ruleId: matched.id,
      level: matched.defaultConfiguration.level,
      message: { text: `${topic.name}: ${topic.reason}` },
      partialFingerprints: { topicRisk: `${topic.name}|${topic.risk}` },
      properties: {
        topic: topic.name,
        risk: topic.risk,
        partitions: topic.partitions,
        replication_factor: topic.replicationFactor,
        retention_ms: topic.retentionMs,
        cleanup_policy: topic.cleanupPolicy,
        recommendation: topic.recommendation,
        cleanup_priority: topic.cleanupPriority,
      },
      topic: topic.name,
    };
  });

  const rules = [HIGH_RISK_RULE, LOW_RISK_RULE, MEDIUM_RISK_RULE].sort((a, b) => compareStrings(a.id, b.id));

  return serializeLog({ tool: { driver: { name: SARIF_TOOL_NAME, rules } }, results: sortResults(results) }, pretty);
}

function serializeLog(run: SarifRun, pretty: boolean): string {
  const { results, ...rest } = run;
  const log = {
    $schema: SARIF_SCHEMA,
    version: SARIF_VERSION,
    runs: [
      {
        ...rest,
        results: results.map(({ topic: _topic, ...entry }) => entry),
      },
    ],
  };
  return serializeJson(log, pretty);
}

function sortResults(results: SarifResult[]): SarifResult[] {
  return results.sort(
    (a, b) =>
      compareStrings(a.ruleId, b.ruleId) ||
      compareStrings(a.topic, b.topic) ||
      compareStrings(a.message.text, b.message.text),
  );
}

function locationsFromReferences(references: readonly Occurrence[]): SarifLocation[] {
  const locations: SarifLocation[] = [];
  for (const ref of references) {
    const file = ref.file.trim();
    if (file === '') {
      continue;
    }
    const uri = posix.normalize(file.replaceAll('\\', '/'));
    locations.push({
      physicalLocation: {
        artifactLocation: { uri, uriBaseId: SRCROOT_BASE_ID },
        ...(ref.line > 0 ? { region: { startLine: ref.line } } : {}),
      },
    });
  }
  return locations;
}

/** `file://` URI of a directory, always ending in `/`. */
export function directoryUri(path: string): string {
  const href = pathToFileURL(path).href;
  return href.endsWith('/') ? href : `${href}/`;
}
