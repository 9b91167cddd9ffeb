import { readFileSync } from 'node:fs';
import type { ConnectionOptions } from 'node:tls';
import kafkajs, { type KafkaConfig, type SASLOptions } from 'kafkajs';
import { z } from 'zod/v4';
import type { AppLogger } from '../../logging.js';
import { InvalidArgumentError, MetadataFetchError, describeCause, type MetadataFetchErrorKind } from '../errors.js';
import { isInternalTopic } from '../filter/excludeMatcher.js';
import { RetryError, isAuthError, unwrapKafkaError, withRetry, type RetryOptions } from './retry.js';
import type { BrokerRecord, ClusterMetadata, ConsumerGroupRecord, MetadataSource, TopicRecord } from './types.js';

const { Kafka, ConfigResourceTypes, logLevel } = kafkajs;

const CLIENT_ID = 'kafka-topic-audit';

/**
 * The slice of the kafkajs admin client the inspector talks to.
 * A kafkajs `Admin` satisfies it; only the fields read here are declared.
 */
export interface ClusterAdmin {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  describeCluster(): Promise<{ brokers: readonly { nodeId: number; host: string; port: number }[] }>;
  fetchTopicMetadata(): Promise<{
    topics: readonly { name: string; partitions: readonly { replicas: readonly number[] }[] }[];
  }>;
  describeConfigs(query: { resources: { type: number; name: string }[]; includeSynonyms: boolean }): Promise<{
    resources: readonly {
      resourceName: string;
      configEntries: readonly { configName: string; configValue: string | null }[];
    }[];
  }>;
  listGroups(): Promise<{ groups: readonly { groupId: string }[] }>;
  describeGroups(groupIds: string[]): Promise<{
    groups: readonly { groupId: string; state: string; members: readonly unknown[] }[];
  }>;
  fetchOffsets(options: { groupId: string }): Promise<readonly { topic: string }[]>;
}

/** Zod schema for connection settings gathered from flags and config. */
export const connectionOptionsSchema = z.object({
  bootstrapServers: z.string().trim().min(1, 'bootstrap-server is required'),
  authMechanism: z.string().trim().default(''),
  username: z.string().default(''),
  password: z.string().default(''),
  tls: z.boolean().default(false),
  tlsCertFile: z.string().default(''),
  tlsKeyFile: z.string().default(''),
  tlsCaFile: z.string().default(''),
  timeoutMs: z.number().positive('timeout must be greater than zero'),
});

export type KafkaConnectionOptions = z.input<typeof connectionOptionsSchema>;
type ConnectionSettings = z.output<typeof connectionOptionsSchema>;

/** Split a comma-separated bootstrap list, dropping blanks. */
export function parseBrokerList(bootstrapServers: string): string[] {
  return bootstrapServers
    .split(',')
    .map((server) => server.trim())
    .filter((server) => server !== '');
}

/** Map a mechanism name to kafkajs SASL options; `undefined` when none is set. */
export function buildSasl(settings: Pick<ConnectionSettings, 'authMechanism' | 'username' | 'password'>): SASLOptions | undefined {
  const { username, password } = settings;
  switch (settings.authMechanism.toUpperCase()) {
    case '':
      return undefined;
    case 'PLAIN':
      return { mechanism: 'plain', username, password };
    case 'SCRAM-SHA-256':
      return { mechanism: 'scram-sha-256', username, password };
    case 'SCRAM-SHA-512':
      return { mechanism: 'scram-sha-512', username, password };
    default:
      throw new InvalidArgumentError(`unsupported SASL mechanism: ${settings.authMechanism}`);
  }
}

/** TLS settings, or `undefined` when TLS is off and no certificate files are given. */
export function buildTls(
  settings: Pick<ConnectionSettings, 'tls' | 'tlsCertFile' | 'tlsKeyFile' | 'tlsCaFile'>,
): ConnectionOptions | undefined {
  if (!settings.tls && settings.tlsCertFile === '' && settings.tlsCaFile === '') {
    return undefined;
  }

  const tls: ConnectionOptions = { minVersion: 'TLSv1.2' };
  if (settings.tlsCertFile !== '' && settings.tlsKeyFile !== '') {
    tls.cert = readPem(settings.tlsCertFile, 'client certificate');
    tls.key = readPem(settings.tlsKeyFile, 'client key');
  }
  if (settings.tlsCaFile !== '') {
    tls.ca = [readPem(settings.tlsCaFile, 'CA certificate')];
  }
  return tls;
}

function readPem(path: string, what: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error: unknown) {
    throw new InvalidArgumentError(`failed to read ${what} "${path}": ${describeCause(error)}`);
  }
}

/** Build the kafkajs client config. Retries are left to {@link withRetry}. */
export function buildKafkaConfig(options: KafkaConnectionOptions, logger: AppLogger): KafkaConfig {
  const parsed = connectionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(issue !== undefined ? issue.message : 'invalid connection options');
  }
  const settings = parsed.data;

  const config: KafkaConfig = {
    clientId: CLIENT_ID,
    brokers: parseBrokerList(settings.bootstrapServers),
    connectionTimeout: settings.timeoutMs,
    requestTimeout: settings.timeoutMs,
    retry: { retries: 0 },
    logLevel: logLevel.WARN,
    logCreator: () => (entry) => {
      logger.debug({ namespace: entry.namespace, kafkaLevel: entry.label }, entry.log.message);
    },
  };

  const sasl = buildSasl(settings);
  if (sasl !== undefined) {
    config.sasl = sasl;
  }
  const ssl = buildTls(settings);
  if (ssl !== undefined) {
    config.ssl = ssl;
  }
  return config;
}

export interface KafkaInspectorOptions {
  /** Upper bound on one whole fetch. */
  readonly timeoutMs: number;
  readonly logger: AppLogger;
  readonly retry?: Pick<RetryOptions, 'maxRetries' | 'initialBackoffMs' | 'maxBackoffMs' | 'sleep'>;
  readonly now?: () => Date;
}

class DeadlineError extends Error {
  constructor(timeoutMs: number) {
    super(`timed out after ${String(timeoutMs)}ms`);
    this.name = 'DeadlineError';
  }
}

/** kafkajs error names that mean the broker could not be reached in time. */
const NETWORK_ERROR_NAMES: ReadonlySet<string> = new Set([
  'KafkaJSConnectionError',
  'KafkaJSConnectionClosedError',
  'KafkaJSRequestTimeoutError',
  'KafkaJSNumberOfRetriesExceeded',
  'KafkaJSBrokerNotFound',
  'KafkaJSTimeout',
]);

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
]);

/** Decide whether a failed fetch step was an auth, network or other problem. */
export function classifyFetchError(error: unknown): MetadataFetchErrorKind {
  const root = unwrapKafkaError(error instanceof RetryError ? error.lastError : error);
  if (isAuthError(root)) {
    return 'auth';
  }
  if (root instanceof DeadlineError) {
    return 'network';
  }
  if (root instanceof Error) {
    if (NETWORK_ERROR_NAMES.has(root.name)) {
      return 'network';
    }
    if ('code' in root && typeof root.code === 'string' && NETWORK_ERROR_CODES.has(root.code)) {
      return 'network';
    }
  }
  return 'unknown';
}

/**
 * Reads brokers, topics, topic configs and consumer groups through the kafkajs
 * admin API. Config and group-detail lookups are best effort.
 */
export class KafkaInspector implements MetadataSource {
  private readonly admin: ClusterAdmin;
  private readonly options: KafkaInspectorOptions;
  private connected = false;
  /** Set while a connect is in flight so `close()` can wait for it. */
  private connecting: Promise<void> | undefined;

  constructor(admin: ClusterAdmin, options: KafkaInspectorOptions) {
    this.admin = admin;
    this.options = options;
  }

  async fetch(): Promise<ClusterMetadata> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new DeadlineError(this.options.timeoutMs);
        controller.abort(error);
        reject(error);
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([this.fetchAll(controller.signal), deadline]);
    } catch (error: unknown) {
      if (error instanceof MetadataFetchError) {
        throw error;
      }
      throw new MetadataFetchError(`fetch cluster metadata: ${describeCause(error)}`, classifyFetchError(error), error);
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    if (pending !== undefined) {
      await pending.catch((error: unknown) => {
        this.options.logger.debug({ err: describeCause(error) }, 'connect abandoned before close');
      });
    }
    if (!this.connected) {
      return;
    }
    this.connected = false;
    await this.admin.disconnect();
  }

  private async fetchAll(signal: AbortSignal): Promise<ClusterMetadata> {
    const { logger } = this.options;
    const retry: RetryOptions = { ...this.options.retry, signal, logger };
    const step = async <T>(description: string, fn: () => Promise<T>): Promise<T> => {
      try {
        return await withRetry(description, fn, retry);
      } catch (error: unknown) {
        const message = error instanceof RetryError ? error.message : `${description}: ${describeCause(error)}`;
        throw new MetadataFetchError(message, classifyFetchError(error), error);
      }
    };

    const fetchedAt = (this.options.now ?? (() => new Date()))();

    if (!this.connected) {
      this.connecting ??= this.connect(() => step('connect to cluster', () => this.admin.connect()));
      await this.connecting;
    }

    signal.throwIfAborted();
    const cluster = await step('fetch broker metadata', () => this.admin.describeCluster());
    const brokers: BrokerRecord[] = cluster.brokers.map((broker) => ({
      id: broker.nodeId,
      host: broker.host,
      port: broker.port,
      rack: '',
    }));

    const topicMetadata = await step('list topics', () => this.admin.fetchTopicMetadata());
    const topicConfigs = new Map<string, Record<string, string>>();
    const partitionsByTopic = new Map<string, { partitions: number; replicationFactor: number }>();
    for (const topic of topicMetadata.topics) {
      partitionsByTopic.set(topic.name, {
        partitions: topic.partitions.length,
        replicationFactor: topic.partitions[0]?.replicas.length ?? 0,
      });
      topicConfigs.set(topic.name, {});
    }

    signal.throwIfAborted();
    await this.loadTopicConfigs(topicConfigs);

    const topics = new Map<string, TopicRecord>();
    for (const [name, shape] of partitionsByTopic) {
      topics.set(name, {
        name,
        partitions: shape.partitions,
        replicationFactor: shape.replicationFactor,
        config: topicConfigs.get(name) ?? {},
        internal: isInternalTopic(name),
      });
    }

    signal.throwIfAborted();
    const listed = await step('list consumer groups', () => this.admin.listGroups());
    const groupIds = listed.groups.map((group) => group.groupId);
    signal.throwIfAborted();
    const consumerGroups = await this.loadConsumerGroups(groupIds);

    logger.debug(
      { brokers: brokers.length, topics: topics.size, consumerGroups: consumerGroups.size },
      'fetched cluster metadata',
    );

    return { brokers, topics, consumerGroups, fetchedAt };
  }

  private async connect(open: () => Promise<void>): Promise<void> {
    try {
      await open();
      this.connected = true;
    } finally {
      this.connecting = undefined;
    }
  }

  private async loadTopicConfigs(configs: Map<string, Record<string, string>>): Promise<void> {
    if (configs.size === 0) {
      return;
    }
    try {
      const described = await this.admin.describeConfigs({
        resources: [...configs.keys()].map((name) => ({ type: ConfigResourceTypes.TOPIC, name })),
        includeSynonyms: false,
      });
      for (const resource of described.resources) {
        const target = configs.get(resource.resourceName);
        if (target === undefined) {
          continue;
        }
        for (const entry of resource.configEntries) {
          if (typeof entry.configValue === 'string') {
            target[entry.configName] = entry.configValue;
          }
        }
      }
    } catch (error: unknown) {
      this.options.logger.warn(
        { err: describeCause(error), topicCount: configs.size },
        'failed to fetch topic configs',
      );
    }
  }

  private async loadConsumerGroups(groupIds: readonly string[]): Promise<Map<string, ConsumerGroupRecord>> {
    const groups = new Map<string, ConsumerGroupRecord>();
    if (groupIds.length === 0) {
      return groups;
    }

    let described: Awaited<ReturnType<ClusterAdmin['describeGroups']>>;
    try {
      described = await this.admin.describeGroups([...groupIds]);
    } catch (error: unknown) {
      this.options.logger.warn(
        { err: describeCause(error), consumerGroupCount: groupIds.length },
        'failed to describe consumer groups',
      );
      return groups;
    }

    for (const group of described.groups) {
      const topics = await this.committedTopics(group.groupId);
      groups.set(group.groupId, {
        groupId: group.groupId,
        state: group.state,
        members: group.members.length,
        topics,
        lag: {},
        lastCommit: null,
        coordinator: -1,
      });
    }
    return groups;
  }

  /** Topics the group has committed offsets for; empty when the lookup fails. */
  private async committedTopics(groupId: string): Promise<string[]> {
    try {
      const offsets = await this.admin.fetchOffsets({ groupId });
      return [...new Set(offsets.map((entry) => entry.topic))];
    } catch (error: unknown) {
      this.options.logger.warn({ err: describeCause(error), groupId }, 'failed to fetch committed offsets');
      return [];
    }
  }
}

/** Create an inspector backed by a real kafkajs admin client. */
export function createKafkaInspector(options: KafkaConnectionOptions, logger: AppLogger): KafkaInspector {
  const config = buildKafkaConfig(options, logger);
  const admin = new Kafka(config).admin();
  return new KafkaInspector(admin, { timeoutMs: options.timeoutMs, logger });
}
