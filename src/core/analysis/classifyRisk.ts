import type { RiskTier } from '../report/reportTypes.js';

/** Risk tier and the cleanup priority that goes with it. */
export interface RiskAssessment {
  readonly risk: RiskTier;
  readonly priority: number;
}

/**
 * Score how risky it is to delete an unused topic.
 * Rules are checked in order; replication alone can make a topic high risk.
 */
export function classifyRisk(partitions: number, replicationFactor: number): RiskAssessment {
  if (partitions >= 10 || replicationFactor >= 3) {
    return { risk: 'high', priority: 3 };
  }
  if (partitions >= 2 || replicationFactor === 2) {
    return { risk: 'medium', priority: 2 };
  }
  return { risk: 'low', priority: 1 };
}

/** Fixed recommendation text per risk tier. */
export function recommendationForRisk(risk: string): string {
  switch (risk) {
    case 'low':
      return 'Safe to delete after confirmation';
    case 'medium':
      return 'Review before deletion';
    case 'high':
      return 'Investigate before deletion';
    default:
      return 'Review before deletion';
  }
}

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 86_400_000;

/**
 * Turn a `retention.ms` value into words.
 * `''` and `-1` mean infinite; text that is not an integer comes back unchanged.
 */
export function formatRetention(retentionMs: string): string {
  if (retentionMs === '' || retentionMs === '-1') {
    return 'infinite';
  }
  if (!/^[+-]?\d+$/.test(retentionMs)) {
    return retentionMs;
  }

  const ms = Number.parseInt(retentionMs, 10);
  const days = Math.trunc(ms / MS_PER_DAY);
  const hours = Math.trunc(ms / MS_PER_HOUR) % 24;

  if (days > 0) {
    return hours > 0 ? `${String(days)} days ${String(hours)} hours` : `${String(days)} days`;
  }
  if (hours > 0) {
    return `${String(hours)} hours`;
  }

  const minutes = Math.trunc(ms / MS_PER_MINUTE);
  if (minutes > 0) {
    return `${String(minutes)} minutes`;
  }

  return `${String(ms)} ms`;
}

/** Topic config keys worth surfacing on an unused-topic finding. */
const INTERESTING_CONFIG_KEYS: ReadonlySet<string> = new Set([
  'retention.ms',
  'retention.bytes',
  'cleanup.policy',
  'min.insync.replicas',
  'compression.type',
  'max.message.bytes',
  'segment.ms',
  'segment.bytes',
  'delete.retention.ms',
]);

/** Keep only the config keys in {@link INTERESTING_CONFIG_KEYS}. */
export function filterInterestingConfig(config: Readonly<Record<string, string>>): Record<string, string> {
  const interesting: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    if (INTERESTING_CONFIG_KEYS.has(key)) {
      interesting[key] = value;
    }
  }
  return interesting;
}
