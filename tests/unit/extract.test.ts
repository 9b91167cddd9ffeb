import { describe, it, expect } from 'vitest';
import {
  extractFromConfig,
  extractFromEnv,
  extractFromSource,
  extractTopicCandidates,
  isLikelyTopic,
  leadingIndent,
  stripInlineComment,
} from '../../src/core/repoScan/extract.js';

describe('isLikelyTopic', () => {
  it.each([
    ['orders.v2', '', true],
    ['audit-log', '', true],
    ['MY.TOPIC', '', true],
    ['ab', '', false],
    ['12345', '', false],
    ['https-feed', '', false],
    ['a{b}c', '', false],
    ['orders', 'url: ${orders}', false],
    ['MY_TOPIC', '', false],
    ['default', '', false],
    ['Latest', '', false],
  ])('%s -> %s', (candidate, context, expected) => {
    expect(isLikelyTopic(candidate, context)).toBe(expected);
  });
});

describe('stripInlineComment', () => {
  it('cuts a trailing comment', () => {
    expect(stripInlineComment('orders   # main topic')).toBe('orders');
  });

  it('keeps # inside quotes', () => {
    expect(stripInlineComment('"a#b" # note')).toBe('"a#b"');
    expect(stripInlineComment("'x#' y")).toBe("'x#' y");
  });
});

describe('leadingIndent', () => {
  it('counts a tab as two', () => {
    expect(leadingIndent('\t  - item')).toBe(4);
    expect(leadingIndent('key: value')).toBe(0);
  });
});

describe('extractTopicCandidates', () => {
  it('returns distinct names in order', () => {
    expect(extractTopicCandidates('orders, orders, payments # note')).toEqual(['orders', 'payments']);
  });

  it('skips placeholders and empty values', () => {
    expect(extractTopicCandidates('${ORDERS_TOPIC}')).toEqual([]);
    expect(extractTopicCandidates('   ')).toEqual([]);
  });
});

describe('extractFromConfig', () => {
  it('reads topic keys and block lists from YAML', () => {
    const yaml = [
      'kafka:',
      '  topics:',
      '    - orders.created',
      '    - "payments"',
      '  consumer_topic: audit-log   # main',
      '  group_id: billing',
      'input_topic: ${INPUT_TOPIC}',
      'topic_list: clicks, views',
      'partitions_per_topic: 12',
      '# topic: commented-out',
    ].join('\n');

    expect(extractFromConfig(yaml)).toEqual([
      { topic: 'orders.created', line: 3, source: 'config' },
      { topic: 'payments', line: 4, source: 'config' },
      { topic: 'audit-log', line: 5, source: 'config' },
      { topic: 'clicks', line: 8, source: 'config' },
      { topic: 'views', line: 8, source: 'config' },
    ]);
  });

  it('reads topic keys from JSON', () => {
    const json = ['{', '  "topic": "inventory.v1",', '  "topics": ["a1-events", "b2-events"]', '}'].join('\n');

    expect(extractFromConfig(json)).toEqual([
      { topic: 'inventory.v1', line: 2, source: 'config' },
      { topic: 'a1-events', line: 3, source: 'config' },
      { topic: 'b2-events', line: 3, source: 'config' },
    ]);
  });

  it('ends a block list at a shallower line', () => {
    const yaml = 'topics:\n  - alpha\nname: beta\n  - gamma\n';
    expect(extractFromConfig(yaml)).toEqual([{ topic: 'alpha', line: 2, source: 'config' }]);
  });
});

describe('extractFromEnv', () => {
  it('reads assignments whose key mentions TOPIC', () => {
    const env = [
      '# local overrides',
      'KAFKA_TOPIC=orders.created',
      'export AUDIT_TOPICS="audit-log,clicks"  # list',
      'KAFKA_BROKERS=localhost:9092',
      'DLQ_TOPIC=${DLQ}',
      'RETRY_TOPIC=',
    ].join('\r\n');

    expect(extractFromEnv(env)).toEqual([
      { topic: 'orders.created', line: 2, source: 'env' },
      { topic: 'audit-log', line: 3, source: 'env' },
      { topic: 'clicks', line: 3, source: 'env' },
    ]);
  });
});

describe('extractFromSource', () => {
  it('reads quoted names on lines that mention topics or kafka', () => {
    const source = [
      '// topic: "commented-out"',
      'producer.Send("orders.created", msg) // kafka topic',
      'const name = "customer-name"',
      'reader := kafka.NewReader(kafka.ReaderConfig{Topic: "payments"})',
      'topic := "ORDERS"',
      'topic = "http-events"',
      'topic := `clicks`',
    ].join('\n');

    expect(extractFromSource(source)).toEqual([
      { topic: 'orders.created', line: 2, source: 'sourceCode' },
      { topic: 'payments', line: 4, source: 'sourceCode' },
      { topic: 'clicks', line: 7, source: 'sourceCode' },
    ]);
  });
});
