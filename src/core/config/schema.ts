import { z } from 'zod/v4';

const TRUE_SPELLINGS: readonly string[] = ['1', 't', 'T', 'TRUE', 'true', 'True'];

/**
 * Zod schema for the boolean spellings accepted by `exclude_internal`.
 * Parses to a real boolean.
 */
export const booleanSpellingSchema = z
  .enum(['1', 't', 'T', 'TRUE', 'true', 'True', '0', 'f', 'F', 'FALSE', 'false', 'False'])
  .transform((value) => TRUE_SPELLINGS.includes(value));

/** Zod schema for the report formats the CLI can emit. */
export const outputFormatSchema = z.enum(['json', 'sarif', 'text', 'spectrehub']);

/** Parsed type for an output format. */
export type OutputFormat = z.infer<typeof outputFormatSchema>;

/** Parsed defaults from a config file. */
export interface Config {
  readonly bootstrapServers: string;
  readonly authMechanism: string;
  /** `null` when the file gave no usable patterns. */
  readonly excludeTopics: readonly string[] | null;
  /** `null` when the file did not mention `exclude_internal`. */
  readonly excludeInternal: boolean | null;
  readonly format: string;
  readonly timeoutMs: number | null;
  readonly hasTimeout: boolean;
}

/** The recognized top-level keys, in documentation order. */
export const CONFIG_KEYS = [
  'bootstrap_servers',
  'auth_mechanism',
  'exclude_topics',
  'exclude_internal',
  'format',
  'timeout',
] as const;

/** A recognized top-level key. */
export type ConfigKey = (typeof CONFIG_KEYS)[number];

/** Narrow a raw key to a recognized one. */
export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}
