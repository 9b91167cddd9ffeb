import { createHash } from 'node:crypto';
import type { AuditResult, CheckResult, CheckStatus, RunInfo } from './reportTypes.js';
import { serializeJson } from './toJson.js';

export const ENVELOPE_SCHEMA = 'spectre/v1';
const ENVELOPE_TOOL = 'kafka-topic-audit';

export type EnvelopeSeverity = 'high' | 'medium' | 'low' | 'info';

interface EnvelopeFinding {
  readonly id: string;
  readonly severity: EnvelopeSeverity;
  readonly location: string;
  readonly message: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

interface EnvelopeSummary {
  total: number;
  high: number;
  medium: number;
  low: number;
  info: number;
}

/** `sha256:<hex>` of the trimmed bootstrap server list. */
export function hashBootstrap(bootstrapServers: string): string {
  return `sha256:${createHash('sha256').update(bootstrapServers.trim()).digest('hex')}`;
}

/** Serialize an AuditResult as a spectre/v1 envelope, one finding per unused topic. */
export function auditToSpectreHub(result: AuditResult, run: RunInfo): string {
  const findings: EnvelopeFinding[] = result.unusedTopics.map((topic) => ({
    id: 'UNUSED_TOPIC',
    severity: topic.risk,
    location: topic.name,
    message: topic.reason,
    metadata: {
      partitions: topic.partitions,
      replication_factor: topic.replicationFactor,
      retention: topic.retentionHuman,
      recommendation: topic.recommendation,
    },
  }));

  return envelope(run, findings, result.summary.clusterName);
}

const CHECK_SEVERITY: Readonly<Record<Exclude<CheckStatus, 'OK'>, EnvelopeSeverity>> = {
  MISSING_IN_CLUSTER: 'high',
  UNUSED: 'medium',
  UNREFERENCED_IN_REPO: 'low',
};

/** Serialize a CheckResult as a spectre/v1 envelope. OK findings are left out. */
export function checkToSpectreHub(result: CheckResult, run: RunInfo): string {
  const findings: EnvelopeFinding[] = [];
  for (const finding of result.findings) {
    if (finding.status === 'OK') {
      continue;
    }
    findings.push({
      id: finding.status,
      severity: CHECK_SEVERITY[finding.status],
      location: finding.topic,
      message: finding.reason,
    });
  }

  return envelope(run, findings, null);
}

function envelope(run: RunInfo, findings: readonly EnvelopeFinding[], cluster: string | null): string {
  const summary: EnvelopeSummary = { total: findings.length, high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of findings) {
    summary[finding.severity]++;
  }

  return serializeJson(
    {
      schema: ENVELOPE_SCHEMA,
      tool: ENVELOPE_TOOL,
      version: run.version,
      timestamp: run.timestamp ?? '',
      target: {
        type: 'kafka',
        uri_hash: hashBootstrap(run.bootstrapServers),
        ...(cluster !== null && cluster !== '' ? { cluster } : {}),
      },
      findings,
      summary,
    },
    true,
  );
}
