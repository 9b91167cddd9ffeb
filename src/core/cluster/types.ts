/** A broker as reported by cluster metadata. */
export interface BrokerRecord {
  readonly id: number;
  readonly host: string;
  readonly port: number;
  /** Empty when the broker reports no rack. */
  readonly rack: string;
}

/** A topic and the configuration that matters to the audit. */
export interface TopicRecord {
  readonly name: string;
  readonly partitions: number;
  readonly replicationFactor: number;
  readonly config: Readonly<Record<string, string>>;
  /** Name starts with `__`. */
  readonly internal: boolean;
}

/** A consumer group and the topics it has committed offsets for. */
export interface ConsumerGroupRecord {
  readonly groupId: string;
  /** Free-form broker state such as `Stable` or `Empty`. */
  readonly state: string;
  readonly members: number;
  readonly topics: readonly string[];
  readonly lag: Readonly<Record<string, number>>;
  readonly lastCommit: Date | null;
  /** Coordinator broker id, `-1` when unknown. */
  readonly coordinator: number;
}

/** One snapshot of cluster state. */
export interface ClusterMetadata {
  readonly brokers: readonly BrokerRecord[];
  readonly topics: ReadonlyMap<string, TopicRecord>;
  readonly consumerGroups: ReadonlyMap<string, ConsumerGroupRecord>;
  readonly fetchedAt: Date;
}

/** Anything that can produce a cluster snapshot. */
export interface MetadataSource {
  fetch(): Promise<ClusterMetadata>;
  close(): Promise<void>;
}
