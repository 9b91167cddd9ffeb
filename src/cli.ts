#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { readFileSync, statSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { z } from 'zod/v4';
import { audit, check } from './index.js';
import { createKafkaInspector, type KafkaConnectionOptions } from './core/cluster/inspector.js';
import type { ClusterMetadata, MetadataSource } from './core/cluster/types.js';
import { candidateConfigPaths, loadConfigFromPath, loadFirstConfig } from './core/config/load.js';
import { parseDuration } from './core/config/duration.js';
import { outputFormatSchema, type Config, type OutputFormat } from './core/config/schema.js';
import {
  ConfigParseError,
  ConfigReadError,
  FindingsError,
  InvalidArgumentError,
  InvalidPatternError,
  MetadataFetchError,
  ScanError,
  describeCause,
} from './core/errors.js';
import { normalizeExcludePatterns } from './core/filter/excludeMatcher.js';
import { RepoScanner } from './core/repoScan/scanner.js';
import type { Scanner } from './core/repoScan/types.js';
import type { AuditResult, CheckResult, RunInfo } from './core/report/reportTypes.js';
import { auditToJson, checkToJson } from './core/report/toJson.js';
import { auditToSarif, checkToSarif } from './core/report/toSarif.js';
import { auditToSpectreHub, checkToSpectreHub } from './core/report/toSpectreHub.js';
import { auditToText, checkToText } from './core/report/toText.js';
import { createLogger, type AppLogger } from './logging.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_FINDINGS = 1;
const EXIT_INVALID_ARGS = 2;
const EXIT_CONFIG_ERROR = 3;
const EXIT_NOT_FOUND = 4;
const EXIT_NETWORK = 5;
const EXIT_INTERNAL = 6;

const DEFAULT_TIMEOUT_MS = 10_000;
const RULE = '-'.repeat(50);

/** Collaborators the commands reach for; tests swap them out. */
export interface CliDeps {
  readonly createSource?: (options: KafkaConnectionOptions, logger: AppLogger) => MetadataSource;
  readonly scanner?: Scanner;
  readonly logger?: AppLogger;
  readonly cwd?: string;
  readonly homeDir?: string | null;
  readonly now?: () => Date;
}

function printUsage(): void {
  process.stdout.write(
    `Usage: kafka-topic-audit <command> [options]

Commands:
  audit                     Audit a Kafka cluster for unused topics
  check                     Compare topics referenced in a repository with the cluster
  version                   Print version information

Options:
  --bootstrap-server <list> Kafka bootstrap server(s) (host:port, comma-separated)
  --auth-mechanism <name>   SASL mechanism: PLAIN | SCRAM-SHA-256 | SCRAM-SHA-512
  --username <name>         SASL username
  --password <secret>       SASL password
  --tls                     Enable TLS
  --tls-cert <path>         TLS client certificate (requires --tls-key)
  --tls-key <path>          TLS client private key (requires --tls-cert)
  --tls-ca <path>           TLS CA certificate
  --format <fmt>            Output format: text | json | sarif | spectrehub (default: text)
  --exclude-internal        Exclude internal topics from analysis
  --exclude-topics <globs>  Exclude topics by name or glob pattern (repeatable, comma-separated)
  --timeout <duration>      Kafka query timeout, e.g. 10s or 1m (default: 10s)
  --repo <path>             Repository to scan (check only)
  --config <path>           Read defaults from this file instead of .kafka-topic-audit.yaml
  --out <path>              Write output to file instead of stdout
  --pretty                  Pretty-print JSON and SARIF output
  --fail-on-findings        Exit 1 when any finding is reported
  --no-timestamp            Omit the timestamp from spectrehub output
  -v, --verbose             Enable debug logging on stderr
  -h, --help                Show this help message
`,
  );
}

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  const parsed = packageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : 'dev';
}

/** Flag values after config defaults and validation. */
interface ResolvedOptions {
  readonly connection: KafkaConnectionOptions;
  readonly format: OutputFormat;
  readonly excludeInternal: boolean;
  readonly excludePatterns: readonly string[];
  readonly repo: string;
  readonly out: string | undefined;
  readonly pretty: boolean;
  readonly failOnFindings: boolean;
  readonly noTimestamp: boolean;
}

type FlagValues = ReturnType<typeof parseFlags>['values'];

function parseFlags(argv: string[] | undefined) {
  return parseArgs({
    args: argv,
    options: {
      'bootstrap-server': { type: 'string' },
      'auth-mechanism': { type: 'string' },
      username: { type: 'string' },
      password: { type: 'string' },
      tls: { type: 'boolean' },
      'tls-cert': { type: 'string' },
      'tls-key': { type: 'string' },
      'tls-ca': { type: 'string' },
      format: { type: 'string' },
      'exclude-internal': { type: 'boolean' },
      'exclude-topics': { type: 'string', multiple: true },
      timeout: { type: 'string' },
      repo: { type: 'string' },
      config: { type: 'string' },
      out: { type: 'string' },
      pretty: { type: 'boolean' },
      'fail-on-findings': { type: 'boolean' },
      'no-timestamp': { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
    strict: true,
  });
}

function loadConfig(values: FlagValues, deps: CliDeps, logger: AppLogger): Config | null {
  if (values.config !== undefined) {
    const config = loadConfigFromPath(resolve(values.config));
    logger.debug({ path: values.config }, 'loaded defaults from config');
    return config;
  }
  const home = deps.homeDir !== undefined ? deps.homeDir : homedir();
  const loaded = loadFirstConfig(candidateConfigPaths(deps.cwd ?? process.cwd(), home));
  if (loaded === null) {
    return null;
  }
  logger.debug({ path: loaded.path }, 'loaded defaults from config');
  return loaded.config;
}

function parseTimeoutFlag(raw: string): number {
  try {
    return parseDuration(raw.trim());
  } catch (error: unknown) {
    throw new InvalidArgumentError(`invalid argument "${raw}" for "--timeout" flag: ${describeCause(error)}`);
  }
}

/**
 * Merge config defaults into the flags the user did not give, then validate.
 * Config values never override a flag given on the command line.
 */
function resolveOptions(command: 'audit' | 'check', values: FlagValues, config: Config | null): ResolvedOptions {
  let bootstrapServers = values['bootstrap-server'] ?? '';
  let authMechanism = values['auth-mechanism'] ?? '';
  let rawFormat = values.format;
  let excludeInternal = values['exclude-internal'];
  let excludeTopics = (values['exclude-topics'] ?? []).flatMap((entry) => entry.split(','));
  let timeoutMs = values.timeout !== undefined ? parseTimeoutFlag(values.timeout) : 0;

  if (config !== null) {
    if (bootstrapServers.trim() === '' && config.bootstrapServers.trim() !== '') {
      bootstrapServers = config.bootstrapServers;
    }
    if (authMechanism.trim() === '' && config.authMechanism.trim() !== '') {
      authMechanism = config.authMechanism;
    }
    if (rawFormat === undefined && config.format.trim() !== '') {
      rawFormat = config.format;
    }
    if (excludeInternal === undefined && config.excludeInternal !== null) {
      excludeInternal = config.excludeInternal;
    }
    if (values['exclude-topics'] === undefined && config.excludeTopics !== null && config.excludeTopics.length > 0) {
      excludeTopics = [...config.excludeTopics];
    }
    if (values.timeout === undefined && config.hasTimeout && config.timeoutMs !== null) {
      timeoutMs = config.timeoutMs;
    }
  }

  const excludePatterns = normalizeExcludePatterns(excludeTopics);
  if (timeoutMs === 0) {
    timeoutMs = DEFAULT_TIMEOUT_MS;
  }

  if (bootstrapServers.trim() === '') {
    throw new InvalidArgumentError('bootstrap-server is required');
  }

  const normalizedFormat = (rawFormat ?? '').trim().toLowerCase();
  const format = outputFormatSchema.safeParse(normalizedFormat === '' ? 'text' : normalizedFormat);
  if (!format.success) {
    throw new InvalidArgumentError(
      `invalid output format "${rawFormat ?? ''}" (expected json, sarif, text, or spectrehub)`,
    );
  }

  const username = values.username ?? '';
  const password = values.password ?? '';
  if (authMechanism !== '' && (username === '' || password === '')) {
    throw new InvalidArgumentError('auth-mechanism requires both --username and --password');
  }
  const tlsCertFile = values['tls-cert'] ?? '';
  const tlsKeyFile = values['tls-key'] ?? '';
  if ((tlsCertFile === '') !== (tlsKeyFile === '')) {
    throw new InvalidArgumentError('--tls-cert and --tls-key must be provided together');
  }
  if (timeoutMs <= 0) {
    throw new InvalidArgumentError('timeout must be greater than zero');
  }

  const repo = values.repo ?? '';
  if (command === 'check') {
    ensureDirectory(repo);
  }

  return {
    connection: {
      bootstrapServers,
      authMechanism,
      username,
      password,
      tls: values.tls === true,
      tlsCertFile,
      tlsKeyFile,
      tlsCaFile: values['tls-ca'] ?? '',
      timeoutMs,
    },
    format: format.data,
    excludeInternal: excludeInternal === true,
    excludePatterns,
    repo,
    out: values.out,
    pretty: values.pretty === true,
    failOnFindings: values['fail-on-findings'] === true,
    noTimestamp: values['no-timestamp'] === true,
  };
}

/** Fail before connecting when the repository path is unusable. */
function ensureDirectory(repo: string): void {
  if (repo.trim() === '') {
    throw new InvalidArgumentError('repo path is required');
  }
  let isDirectory: boolean;
  try {
    isDirectory = statSync(resolve(repo)).isDirectory();
  } catch (error: unknown) {
    throw new ScanError(`repo path "${repo}": ${describeCause(error)}`, 'not_found', error);
  }
  if (!isDirectory) {
    throw new ScanError(`repo path "${repo}" is not a directory`, 'not_found');
  }
}

function metadataStats(metadata: ClusterMetadata): { topicCount: number; partitionCount: number } {
  let partitionCount = 0;
  for (const topic of metadata.topics.values()) {
    partitionCount += topic.partitions;
  }
  return { topicCount: metadata.topics.size, partitionCount };
}

function renderAudit(result: AuditResult, options: ResolvedOptions, run: RunInfo): string {
  switch (options.format) {
    case 'json':
      return auditToJson(result, options.pretty);
    case 'sarif':
      return auditToSarif(result, options.pretty);
    case 'spectrehub':
      return auditToSpectreHub(result, run);
    case 'text': {
      const { summary } = result;
      const sections = [
        'Kafka Topic Audit',
        `Broker: ${options.connection.bootstrapServers}`,
        `Topics: ${String(summary.totalTopics)} (internal excluded: ${String(summary.internalTopics)})`,
        `Consumer Groups: ${String(summary.totalConsumerGroups)}`,
        RULE,
        auditToText(result),
      ];
      if (summary.unusedTopics === 0) {
        sections.push('', `No issues detected. ${String(summary.totalTopics)} topics scanned.`);
      }
      return sections.join('\n');
    }
  }
}

function renderCheck(result: CheckResult, options: ResolvedOptions, run: RunInfo): string {
  switch (options.format) {
    case 'json':
      return checkToJson(result, options.pretty);
    case 'sarif':
      return checkToSarif(result, options.pretty);
    case 'spectrehub':
      return checkToSpectreHub(result, run);
    case 'text': {
      const { summary } = result;
      const sections = [
        'Kafka Topic Check',
        `Broker: ${options.connection.bootstrapServers}`,
        `Repository: ${options.repo}`,
        `Cluster Topics: ${String(summary.clusterTopics)}`,
        `Repository Topics: ${String(summary.repoTopics)}`,
        `Total Consumer Groups: ${String(result.metadata.consumerGroups.size)}`,
        RULE,
        checkToText(result),
      ];
      if (summary.totalFindings === 0) {
        sections.push(
          '',
          `No issues detected. ${String(summary.repoTopics + summary.clusterTopics)} topics scanned in repository and cluster.`,
        );
      }
      return sections.join('\n');
    }
  }
}

function emit(output: string, out: string | undefined): void {
  if (out !== undefined) {
    writeFileSync(resolve(out), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }
}

async function runAudit(options: ResolvedOptions, deps: CliDeps, logger: AppLogger): Promise<void> {
  const start = Date.now();
  const createSource = deps.createSource ?? createKafkaInspector;
  const source = createSource(options.connection, logger);

  logger.info({ bootstrapServers: options.connection.bootstrapServers }, 'connecting to cluster');
  const result = await audit(source, options, logger);

  const run = runInfo(options, deps);
  emit(renderAudit(result, options, run), options.out);

  const { topicCount, partitionCount } = metadataStats(result.metadata);
  logger.info(
    {
      topicCount,
      partitionCount,
      consumerGroupCount: result.metadata.consumerGroups.size,
      durationMs: Date.now() - start,
    },
    'audit completed',
  );

  if (options.failOnFindings && result.unusedTopics.length > 0) {
    throw new FindingsError(result.unusedTopics.length);
  }
}

async function runCheck(options: ResolvedOptions, deps: CliDeps, logger: AppLogger): Promise<void> {
  const start = Date.now();
  const createSource = deps.createSource ?? createKafkaInspector;
  const source = createSource(options.connection, logger);
  const scanner = deps.scanner ?? new RepoScanner({ logger });

  logger.info({ bootstrapServers: options.connection.bootstrapServers }, 'connecting to cluster');

  const result = await check(source, scanner, resolve(options.repo), options, logger);
  const { metadata } = result;
  emit(renderCheck(result, options, runInfo(options, deps)), options.out);

  const { topicCount, partitionCount } = metadataStats(metadata);
  logger.info(
    {
      topicCount,
      partitionCount,
      consumerGroupCount: metadata.consumerGroups.size,
      durationMs: Date.now() - start,
    },
    'check completed',
  );

  const issues = result.summary.totalFindings - result.summary.okCount;
  if (options.failOnFindings && issues > 0) {
    throw new FindingsError(issues);
  }
}

function runInfo(options: ResolvedOptions, deps: CliDeps): RunInfo {
  return {
    version: readVersion(),
    timestamp: options.noTimestamp ? null : (deps.now ?? (() => new Date()))().toISOString(),
    bootstrapServers: options.connection.bootstrapServers,
  };
}

/** Map a failure to its exit code. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof FindingsError) {
    return EXIT_FINDINGS;
  }
  if (error instanceof InvalidArgumentError || error instanceof InvalidPatternError) {
    return EXIT_INVALID_ARGS;
  }
  if (error instanceof ConfigParseError || error instanceof ConfigReadError) {
    return EXIT_CONFIG_ERROR;
  }
  if (error instanceof ScanError) {
    return error.kind === 'not_found' ? EXIT_NOT_FOUND : EXIT_INTERNAL;
  }
  if (error instanceof MetadataFetchError) {
    return error.kind === 'unknown' ? EXIT_INTERNAL : EXIT_NETWORK;
  }
  return EXIT_INTERNAL;
}

function reportError(error: unknown): number {
  const code = exitCodeFor(error);
  process.stderr.write(`Error: ${describeCause(error)}\n`);
  if (code !== EXIT_FINDINGS) {
    process.stderr.write('Use --help for usage.\n');
  }
  return code;
}

export async function main(argv?: string[], deps: CliDeps = {}): Promise<number> {
  let args: ReturnType<typeof parseFlags>;

  try {
    args = parseFlags(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_INVALID_ARGS;
  }

  const { values, positionals } = args;
  const command = positionals[0];

  if (values.help === true || command === undefined) {
    printUsage();
    return EXIT_OK;
  }

  if (command === 'version') {
    process.stdout.write(`version: ${readVersion()}\ncommit:  unknown\ndate:    unknown\n`);
    return EXIT_OK;
  }

  if (command !== 'audit' && command !== 'check') {
    process.stderr.write(`Error: unknown command "${command}". Use --help for usage.\n`);
    return EXIT_INVALID_ARGS;
  }
  if (positionals.length > 1) {
    process.stderr.write(`Error: unexpected argument "${String(positionals[1])}". Use --help for usage.\n`);
    return EXIT_INVALID_ARGS;
  }

  const logger = deps.logger ?? createLogger({ verbose: values.verbose === true });

  try {
    const config = loadConfig(values, deps, logger);
    const options = resolveOptions(command, values, config);
    if (command === 'audit') {
      await runAudit(options, deps, logger);
    } else {
      await runCheck(options, deps, logger);
    }
    return EXIT_OK;
  } catch (error: unknown) {
    logger.debug({ err: describeCause(error) }, 'command failed');
    return reportError(error);
  }
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${describeCause(error)}\n`);
      process.exitCode = EXIT_INTERNAL;
    });
}
