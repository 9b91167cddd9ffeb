import { compareStrings, formatTenths } from '../../util/index.js';
import { CHECK_STATUS_ORDER, type AuditResult, type CheckResult, type RiskTier } from './reportTypes.js';

const RISK_LEVEL: Readonly<Record<RiskTier, number>> = { high: 3, medium: 2, low: 1 };

/** Consumer groups listed per active topic before the rest are summarized. */
const ACTIVE_GROUPS_SHOWN = 3;

/** References listed per check finding before the rest are summarized. */
const REFERENCES_SHOWN = 5;

/**
 * Format an AuditResult as human-readable text.
 */
export function auditToText(result: AuditResult): string {
  const { summary } = result;
  const lines: string[] = [];

  lines.push('Kafka Cluster Audit Report');
  lines.push('===========================');
  lines.push('');
  lines.push('Summary:');
  lines.push('========');
  lines.push('');
  lines.push(
    `Cluster: ${summary.clusterName} (${String(summary.totalBrokers)} brokers, ${String(summary.totalConsumerGroups)} consumer groups)`,
  );
  lines.push('');

  lines.push('Topics:');
  lines.push(`  Total (including internal): ${String(summary.totalTopicsIncludingInternal)}`);
  lines.push(`  Analyzed:                   ${String(summary.totalTopics)}`);
  lines.push(`  Active (with consumers):    ${String(summary.activeTopics)}`);
  lines.push(`  Unused (no consumers):      ${String(summary.unusedTopics)} (${formatTenths(summary.unusedPercentage)}%)`);
  lines.push(`  Internal (excluded):        ${String(summary.internalTopics)}`);
  lines.push('');

  lines.push('Partitions:');
  lines.push(`  Total:    ${String(summary.totalPartitions)}`);
  lines.push(`  Active:   ${String(summary.activePartitions)}`);
  lines.push(`  Unused:   ${String(summary.unusedPartitions)} (${formatTenths(summary.unusedPartitionsPercentage)}%)`);
  lines.push('');

  if (summary.unusedTopics > 0) {
    lines.push('Risk Breakdown:');
    lines.push(`  High Risk:   ${String(summary.highRiskCount)} topics`);
    lines.push(`  Medium Risk: ${String(summary.mediumRiskCount)} topics`);
    lines.push(`  Low Risk:    ${String(summary.lowRiskCount)} topics`);
    lines.push('');
  }

  lines.push(`Cluster Health: ${summary.clusterHealthScore}`);
  lines.push('');
  lines.push(`Potential Savings: ${summary.potentialSavingsInfo}`);
  lines.push('');

  if (result.unusedTopics.length > 0) {
    lines.push('Unused Topics (No Consumer Groups)');
    lines.push('===================================');
    lines.push('');

    // Riskiest first, then by name
    const byRisk = [...result.unusedTopics].sort((a, b) => {
      const diff = RISK_LEVEL[b.risk] - RISK_LEVEL[a.risk];
      return diff !== 0 ? diff : compareStrings(a.name, b.name);
    });

    for (const topic of byRisk) {
      lines.push(`[UNUSED] ${topic.name}`);
      lines.push(`  Partitions: ${String(topic.partitions)}, Replication: ${String(topic.replicationFactor)}`);
      if (topic.retentionHuman !== '') {
        lines.push(`  Retention: ${topic.retentionHuman}`);
      }
      if (topic.cleanupPolicy !== '') {
        lines.push(`  Cleanup Policy: ${topic.cleanupPolicy}`);
      }
      lines.push(`  Reason: ${topic.reason}`);
      lines.push(`  Risk: ${topic.risk}`);
      lines.push(`  Recommendation: ${topic.recommendation}`);
      lines.push('');
    }
  }

  if (result.activeTopics.length > 0) {
    lines.push('Active Topics (With Consumer Groups)');
    lines.push('=====================================');
    lines.push('');

    for (const topic of result.activeTopics) {
      const shown = topic.consumerGroups.slice(0, ACTIVE_GROUPS_SHOWN).join(', ');
      const hidden = topic.consumerGroups.length - ACTIVE_GROUPS_SHOWN;
      const more = hidden > 0 ? `, ... and ${String(hidden)} more` : '';

      lines.push(`[ACTIVE] ${topic.name}`);
      lines.push(`  Partitions: ${String(topic.partitions)}, Replication: ${String(topic.replicationFactor)}`);
      lines.push(`  Consumer Groups (${String(topic.consumerGroups.length)}): ${shown}${more}`);
      lines.push('');
    }
  }

  if (summary.unusedTopics > 0) {
    lines.push('Cleanup Recommendations');
    lines.push('=======================');
    lines.push('');
    lines.push(`Found ${String(summary.unusedTopics)} unused topics that may be candidates for deletion.`);
    lines.push('');
    lines.push('Before deleting any topics:');
    lines.push('  1. Verify with application owners that topics are truly unused');
    lines.push('  2. Check if topics are consumed by external systems not visible here');
    lines.push('  3. Consider archiving topic data before deletion');
    lines.push('  4. Test in a non-production environment first');
    lines.push('');
    lines.push('Risk Levels:');
    lines.push('  - low:    Safe to delete (small topic, no consumers)');
    lines.push('  - medium: Review carefully (larger topic, no consumers)');
    lines.push('  - high:   Do not delete without confirmation');
  } else {
    lines.push('No unused topics detected. All topics have active consumer groups.');
  }

  return lines.join('\n');
}

/**
 * Format a CheckResult as human-readable text, grouped by status.
 */
export function checkToText(result: CheckResult): string {
  const { summary } = result;
  const lines: string[] = [];

  lines.push('Kafka Topic Check Report');
  lines.push('========================');
  lines.push('');
  lines.push('Summary:');
  lines.push(`  Repo Path:              ${summary.repoPath}`);
  lines.push(`  Files Scanned:          ${String(summary.filesScanned)}`);
  lines.push(`  Topics In Repo:         ${String(summary.repoTopics)}`);
  lines.push(`  Topics In Cluster:      ${String(summary.clusterTopics)}`);
  lines.push(`  OK:                     ${String(summary.okCount)}`);
  lines.push(`  MISSING_IN_CLUSTER:     ${String(summary.missingInClusterCount)}`);
  lines.push(`  UNREFERENCED_IN_REPO:   ${String(summary.unreferencedInRepoCount)}`);
  lines.push(`  UNUSED:                 ${String(summary.unusedCount)}`);
  lines.push(`  Total Findings:         ${String(summary.totalFindings)}`);
  lines.push('');

  if (result.findings.length === 0) {
    lines.push('No topic findings detected.');
    return lines.join('\n');
  }

  for (const status of CHECK_STATUS_ORDER) {
    const group = result.findings.filter((f) => f.status === status);
    if (group.length === 0) {
      continue;
    }

    lines.push(`${status} (${String(group.length)})`);
    lines.push('-'.repeat(status.length + 5));
    lines.push('');

    for (const finding of group) {
      lines.push(`[${finding.status}] ${finding.topic}`);
      if (finding.reason !== '') {
        lines.push(`  Reason: ${finding.reason}`);
      }
      if (finding.consumerGroups.length > 0) {
        lines.push(`  Consumer Groups: ${finding.consumerGroups.join(', ')}`);
      }
      if (finding.references.length > 0) {
        lines.push('  References:');
        for (const ref of finding.references.slice(0, REFERENCES_SHOWN)) {
          const where = ref.line > 0 ? `${ref.file}:${String(ref.line)}` : ref.file;
          lines.push(`    - ${where} (${ref.source})`);
        }
        if (finding.references.length > REFERENCES_SHOWN) {
          lines.push(`    - ... and ${String(finding.references.length - REFERENCES_SHOWN)} more`);
        }
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}
