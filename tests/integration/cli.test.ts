import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { resolve, join } from 'node:path';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { exitCodeFor, main, type CliDeps } from '../../src/cli.js';
import type { ClusterMetadata, MetadataSource } from '../../src/core/cluster/types.js';
import {
  ConfigParseError,
  ConfigReadError,
  FindingsError,
  InvalidArgumentError,
  InvalidPatternError,
  MetadataFetchError,
  ScanError,
} from '../../src/core/errors.js';
import { silentLogger } from '../../src/logging.js';
import { broker, group, metadataOf, topic } from '../fixtures/metadata.js';

const SAMPLE_REPO = resolve(import.meta.dirname, '../fixtures/sample-repo');
const NOW = new Date('2024-03-05T14:07:09Z');
const RULE = '-'.repeat(50);

class FakeSource implements MetadataSource {
  closeCalls = 0;
  private readonly outcome: ClusterMetadata | Error;

  constructor(outcome: ClusterMetadata | Error) {
    this.outcome = outcome;
  }

  async fetch(): Promise<ClusterMetadata> {
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

function auditCluster(): ClusterMetadata {
  return metadataOf(
    [
      topic('orders', 3, 2),
      topic('audit', 1, 1),
      topic('payments', 1, 1, { 'retention.ms': '86400000' }),
      topic('clicks', 11, 3),
    ],
    [group('g-billing', ['orders', 'audit'])],
    [broker(1, 'kafka-1.internal'), broker(2, 'kafka-2.internal')],
  );
}

function checkCluster(): ClusterMetadata {
  return metadataOf(
    [topic('orders', 3, 2), topic('payments', 1, 1), topic('legacy', 1, 1), topic('__consumer_offsets', 50, 3)],
    [group('g-billing', ['orders']), group('g-old', ['legacy'])],
  );
}

describe('CLI', () => {
  let stdoutOutput: string;
  let stderrOutput: string;
  let workDir: string;
  let source: FakeSource;
  let createSource: Mock<NonNullable<CliDeps['createSource']>>;

  const run = (argv: string[], overrides: CliDeps = {}): Promise<number> =>
    main(argv, { createSource, homeDir: null, cwd: workDir, logger: silentLogger(), now: () => NOW, ...overrides });

  const useCluster = (outcome: ClusterMetadata | Error): void => {
    source = new FakeSource(outcome);
    createSource.mockReturnValue(source);
  };

  beforeEach(() => {
    stdoutOutput = '';
    stderrOutput = '';
    workDir = mkdtempSync(join(tmpdir(), 'topic-audit-cli-'));
    createSource = vi.fn<NonNullable<CliDeps['createSource']>>();
    useCluster(auditCluster());
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk);
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk);
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('--help', () => {
    it('prints usage and returns 0', async () => {
      const code = await run(['--help']);
      expect(code).toBe(0);
      expect(stdoutOutput).toContain('Usage: kafka-topic-audit <command> [options]');
      expect(stdoutOutput).toContain('--bootstrap-server <list>');
      expect(stdoutOutput).toContain('--exclude-topics <globs>');
    });

    it('prints usage when no command is given', async () => {
      expect(await run([])).toBe(0);
      expect(stdoutOutput).toContain('Commands:');
    });
  });

  describe('version', () => {
    it('prints the package version', async () => {
      expect(await run(['version'])).toBe(0);
      expect(stdoutOutput).toMatch(/^version: \d+\.\d+\.\d+\ncommit: {2}unknown\ndate: {4}unknown\n$/);
    });
  });

  describe('argument validation', () => {
    it('rejects unknown flags with exit code 2', async () => {
      expect(await run(['audit', '--unknown-flag'])).toBe(2);
      expect(stderrOutput).toMatch(/^Error: Unknown option '--unknown-flag'/);
      expect(stderrOutput).toContain('Use --help for usage.');
    });

    it('rejects an unknown command', async () => {
      expect(await run(['scan'])).toBe(2);
      expect(stderrOutput).toBe('Error: unknown command "scan". Use --help for usage.\n');
    });

    it('rejects a stray positional argument', async () => {
      expect(await run(['audit', 'extra'])).toBe(2);
      expect(stderrOutput).toBe('Error: unexpected argument "extra". Use --help for usage.\n');
    });

    it('requires a bootstrap server', async () => {
      expect(await run(['audit'])).toBe(2);
      expect(stderrOutput).toBe('Error: bootstrap-server is required\nUse --help for usage.\n');
      expect(createSource).not.toHaveBeenCalled();
    });

    it('rejects an unknown output format', async () => {
      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--format', 'xml'])).toBe(2);
      expect(stderrOutput).toBe(
        'Error: invalid output format "xml" (expected json, sarif, text, or spectrehub)\nUse --help for usage.\n',
      );
    });

    it('requires credentials with an auth mechanism', async () => {
      const code = await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--auth-mechanism', 'PLAIN', '--username', 'svc']);
      expect(code).toBe(2);
      expect(stderrOutput).toBe('Error: auth-mechanism requires both --username and --password\nUse --help for usage.\n');
    });

    it('requires a client key with a client certificate', async () => {
      const code = await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--tls-cert', 'client.pem']);
      expect(code).toBe(2);
      expect(stderrOutput).toBe('Error: --tls-cert and --tls-key must be provided together\nUse --help for usage.\n');
    });

    it('rejects an unparseable timeout', async () => {
      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--timeout', 'soon'])).toBe(2);
      expect(stderrOutput).toBe(
        'Error: invalid argument "soon" for "--timeout" flag: invalid duration "soon"\nUse --help for usage.\n',
      );
    });

    it('rejects a malformed exclude pattern', async () => {
      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--exclude-topics', 'orders-['])).toBe(2);
      expect(stderrOutput).toContain('Error: invalid exclude topic pattern "orders-["');
    });
  });

  describe('audit', () => {
    it('writes a JSON report', async () => {
      const code = await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--format', 'json']);

      expect(code).toBe(0);
      const report: unknown = JSON.parse(stdoutOutput);
      expect(report).toHaveProperty('summary.unused_topics', 2);
      expect(report).toHaveProperty('summary.recommended_cleanup_topics', ['payments', 'clicks']);
      expect(report).toHaveProperty('cluster_metadata.fetched_at', '2024-03-05 14:07:09 UTC');
      expect(createSource).toHaveBeenCalledTimes(1);
      expect(createSource.mock.calls[0]?.[0]).toEqual({
        bootstrapServers: 'kafka-1:9092',
        authMechanism: '',
        username: '',
        password: '',
        tls: false,
        tlsCertFile: '',
        tlsKeyFile: '',
        tlsCaFile: '',
        timeoutMs: 10_000,
      });
      expect(source.closeCalls).toBe(1);
    });

    it('prefixes the text report with the run header', async () => {
      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092'])).toBe(0);

      expect(stdoutOutput.split('\n').slice(0, 6)).toEqual([
        'Kafka Topic Audit',
        'Broker: kafka-1:9092',
        'Topics: 4 (internal excluded: 0)',
        'Consumer Groups: 1',
        RULE,
        'Kafka Cluster Audit Report',
      ]);
    });

    it('reports a clean cluster', async () => {
      useCluster(metadataOf([topic('orders', 3, 2)], [group('g-billing', ['orders'])]));

      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092'])).toBe(0);
      expect(stdoutOutput.endsWith('\n\nNo issues detected. 1 topics scanned.\n')).toBe(true);
    });

    it('excludes internal topics and patterns', async () => {
      useCluster(metadataOf([topic('orders', 3, 2), topic('tmp-1', 1, 1), topic('__consumer_offsets', 50, 3)]));

      const code = await run([
        'audit',
        '--bootstrap-server',
        'kafka-1:9092',
        '--format',
        'json',
        '--exclude-internal',
        '--exclude-topics',
        'tmp-*, scratch',
      ]);

      expect(code).toBe(0);
      const report: unknown = JSON.parse(stdoutOutput);
      expect(report).toHaveProperty('summary.total_topics_analyzed', 1);
      expect(report).toHaveProperty('summary.internal_topics_excluded', 1);
      expect(report).toHaveProperty('summary.total_topics_including_internal', 3);
    });

    it('exits 1 with --fail-on-findings', async () => {
      const code = await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--fail-on-findings']);

      expect(code).toBe(1);
      expect(stdoutOutput).toContain('[UNUSED] clicks');
      expect(stderrOutput).toBe('Error: 2 findings detected\n');
    });

    it('stamps spectrehub output', async () => {
      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--format', 'spectrehub'])).toBe(0);

      const envelope: unknown = JSON.parse(stdoutOutput);
      expect(envelope).toHaveProperty('timestamp', '2024-03-05T14:07:09.000Z');
      expect(envelope).toHaveProperty('target.cluster', 'kafka-1.internal');
      expect(envelope).toHaveProperty('summary', { total: 2, high: 1, medium: 0, low: 1, info: 0 });
    });

    it('drops the timestamp with --no-timestamp', async () => {
      const code = await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--format', 'spectrehub', '--no-timestamp']);
      expect(code).toBe(0);
      expect(JSON.parse(stdoutOutput)).toHaveProperty('timestamp', '');
    });

    it('writes to --out instead of stdout', async () => {
      const out = join(workDir, 'report.sarif');

      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092', '--format', 'sarif', '--out', out])).toBe(0);

      expect(stdoutOutput).toBe('');
      const log: unknown = JSON.parse(readFileSync(out, 'utf-8'));
      expect(log).toHaveProperty('version', '2.1.0');
      expect(log).toHaveProperty('runs.0.results.0.ruleId', 'kafka-topic-audit/HIGH_RISK_TOPIC');
    });

    it('exits 5 on an auth failure and still closes the connection', async () => {
      useCluster(new MetadataFetchError('connect to cluster: SASL authentication failed', 'auth'));

      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092'])).toBe(5);
      expect(stderrOutput).toBe('Error: connect to cluster: SASL authentication failed\nUse --help for usage.\n');
      expect(source.closeCalls).toBe(1);
    });

    it('exits 6 on an unexpected fetch failure', async () => {
      useCluster(new MetadataFetchError('list topics: unexpected response', 'unknown'));

      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092'])).toBe(6);
    });
  });

  describe('config file', () => {
    const writeConfig = (text: string): string => {
      const path = join(workDir, '.kafka-topic-audit.yaml');
      writeFileSync(path, text);
      return path;
    };

    it('fills in flags that were not given', async () => {
      writeConfig(
        [
          'bootstrap_servers: cfg-1:9092',
          'format: json',
          'exclude_internal: true',
          'exclude_topics: ["click*"]',
          'timeout: 30s',
        ].join('\n'),
      );

      expect(await run(['audit'])).toBe(0);

      expect(createSource.mock.calls[0]?.[0]).toMatchObject({ bootstrapServers: 'cfg-1:9092', timeoutMs: 30_000 });
      const report: unknown = JSON.parse(stdoutOutput);
      expect(report).toHaveProperty('summary.total_topics_analyzed', 3);
      expect(report).toHaveProperty('summary.recommended_cleanup_topics', ['payments']);
    });

    it('never overrides a flag', async () => {
      writeConfig('bootstrap_servers: cfg-1:9092\nformat: json\n');

      expect(await run(['audit', '--bootstrap-server', 'flag-1:9092', '--format', 'text'])).toBe(0);
      expect(stdoutOutput.startsWith('Kafka Topic Audit\nBroker: flag-1:9092\n')).toBe(true);
    });

    it('exits 3 when the config does not parse', async () => {
      const path = writeConfig('color: blue\n');

      expect(await run(['audit', '--bootstrap-server', 'kafka-1:9092'])).toBe(3);
      expect(stderrOutput).toBe(`Error: parse config "${path}": line 1: unknown key "color"\nUse --help for usage.\n`);
      expect(createSource).not.toHaveBeenCalled();
    });

    it('exits 3 when --config names a missing file', async () => {
      const missing = join(workDir, 'missing.yaml');

      expect(await run(['audit', '--config', missing])).toBe(3);
      expect(stderrOutput).toContain(`Error: read config "${missing}": ENOENT`);
    });
  });

  describe('check', () => {
    beforeEach(() => {
      useCluster(checkCluster());
    });

    it('requires --repo', async () => {
      expect(await run(['check', '--bootstrap-server', 'kafka-1:9092'])).toBe(2);
      expect(stderrOutput).toBe('Error: repo path is required\nUse --help for usage.\n');
    });

    it('exits 4 when the repository does not exist', async () => {
      const missing = join(workDir, 'nope');

      expect(await run(['check', '--bootstrap-server', 'kafka-1:9092', '--repo', missing])).toBe(4);
      expect(stderrOutput).toContain(`Error: repo path "${missing}": ENOENT`);
      expect(createSource).not.toHaveBeenCalled();
    });

    it('compares the repository with the cluster', async () => {
      const code = await run([
        'check',
        '--bootstrap-server',
        'kafka-1:9092',
        '--repo',
        SAMPLE_REPO,
        '--exclude-internal',
        '--format',
        'json',
      ]);

      expect(code).toBe(0);
      const report: unknown = JSON.parse(stdoutOutput);
      expect(report).toHaveProperty('summary', {
        repo_path: SAMPLE_REPO,
        files_scanned: 3,
        repo_topics: 3,
        cluster_topics: 3,
        total_findings: 4,
        ok_count: 1,
        missing_in_cluster_count: 1,
        unreferenced_in_repo_count: 1,
        unused_count: 1,
      });
      expect(report).toMatchObject({
        findings: [
          { topic: 'orders.v2', status: 'MISSING_IN_CLUSTER' },
          { topic: 'payments', status: 'UNUSED', references: [{ file: '.env', line: 2, source: 'env' }] },
          { topic: 'legacy', status: 'UNREFERENCED_IN_REPO', consumer_groups: ['g-old'] },
          {
            topic: 'orders',
            status: 'OK',
            references: [
              { file: 'config/application.yaml', line: 4, source: 'config' },
              { file: 'worker/consumer.py', line: 3, source: 'sourceCode' },
            ],
          },
        ],
      });
      expect(source.closeCalls).toBe(1);
    });

    it('prefixes the text report with the run header', async () => {
      expect(await run(['check', '--bootstrap-server', 'kafka-1:9092', '--repo', SAMPLE_REPO])).toBe(0);

      expect(stdoutOutput.split('\n').slice(0, 8)).toEqual([
        'Kafka Topic Check',
        'Broker: kafka-1:9092',
        `Repository: ${SAMPLE_REPO}`,
        'Cluster Topics: 4',
        'Repository Topics: 3',
        'Total Consumer Groups: 2',
        RULE,
        'Kafka Topic Check Report',
      ]);
    });

    it('counts everything but OK toward --fail-on-findings', async () => {
      const code = await run([
        'check',
        '--bootstrap-server',
        'kafka-1:9092',
        '--repo',
        SAMPLE_REPO,
        '--exclude-internal',
        '--fail-on-findings',
      ]);

      expect(code).toBe(1);
      expect(stderrOutput).toBe('Error: 3 findings detected\n');
    });

    it('exits 6 when the scan fails partway', async () => {
      const scanner = {
        scan: async (): Promise<never> => {
          throw new ScanError('scan config/app.yaml: EACCES: permission denied', 'io');
        },
      };

      expect(await run(['check', '--bootstrap-server', 'kafka-1:9092', '--repo', SAMPLE_REPO], { scanner })).toBe(6);
      expect(stderrOutput).toBe('Error: scan config/app.yaml: EACCES: permission denied\nUse --help for usage.\n');
    });
  });
});

describe('exitCodeFor', () => {
  it.each([
    [new FindingsError(3), 1],
    [new InvalidArgumentError('bad'), 2],
    [new InvalidPatternError('a[', 'unterminated character class'), 2],
    [new ConfigParseError('unknown key "x"', 1), 3],
    [new ConfigReadError('/etc/audit.yaml', new Error('EACCES')), 3],
    [new ScanError('missing', 'not_found'), 4],
    [new ScanError('denied', 'io'), 6],
    [new MetadataFetchError('refused', 'network'), 5],
    [new MetadataFetchError('denied', 'auth'), 5],
    [new MetadataFetchError('odd', 'unknown'), 6],
    [new Error('boom'), 6],
  ])('%s -> %i', (error, code) => {
    expect(exitCodeFor(error)).toBe(code);
  });
});
