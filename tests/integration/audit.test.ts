import { describe, it, expect, vi } from 'vitest';
import { resolve } from 'node:path';
import { RepoScanner, audit, check, type MetadataSource } from '../../src/index.js';
import { auditToJson, checkToJson } from '../../src/core/report/toJson.js';
import { captureLogger } from '../fixtures/logger.js';
import { group, metadataOf, topic } from '../fixtures/metadata.js';

const SAMPLE_REPO = resolve(import.meta.dirname, '../fixtures/sample-repo');

function sourceOf(metadata = metadataOf([topic('orders', 3, 2), topic('payments', 1, 1)], [group('g-billing', ['orders'])])) {
  return {
    fetch: vi.fn<MetadataSource['fetch']>().mockResolvedValue(metadata),
    close: vi.fn<MetadataSource['close']>().mockResolvedValue(undefined),
  };
}

describe('audit (integration)', () => {
  it('produces deterministic JSON output', async () => {
    const filter = { excludeInternal: true, excludePatterns: [] };
    const first = auditToJson(await audit(sourceOf(), filter), false);
    const second = auditToJson(await audit(sourceOf(), filter), false);
    expect(first).toBe(second);
  });

  it('closes the source after fetching', async () => {
    const source = sourceOf();

    const result = await audit(source, { excludeInternal: false, excludePatterns: [] });

    expect(result.unusedTopics.map((t) => t.name)).toEqual(['payments']);
    expect(source.close).toHaveBeenCalledTimes(1);
  });

  it('keeps the result when closing fails', async () => {
    const source = sourceOf();
    source.close.mockRejectedValue(new Error('socket already closed'));
    const log = captureLogger('warn');

    const result = await audit(source, { excludeInternal: false, excludePatterns: [] }, log.logger);

    expect(result.summary.totalTopics).toBe(2);
    expect(log.entries()).toEqual([
      expect.objectContaining({ msg: 'failed to close cluster connection', err: 'socket already closed' }),
    ]);
  });

  it('honors the cleanup limit', async () => {
    const source = sourceOf(metadataOf([topic('a-1', 1, 1), topic('b-1', 1, 1), topic('c-1', 1, 1)]));

    const result = await audit(source, { excludeInternal: false, excludePatterns: [], cleanupLimit: 2 });

    expect(result.summary.recommendedCleanup).toEqual(['a-1', 'b-1']);
  });
});

describe('check (integration)', () => {
  it('reads the cluster before scanning the repository', async () => {
    const source = sourceOf();
    const scanner = new RepoScanner();
    const scan = vi.spyOn(scanner, 'scan');

    await check(source, scanner, SAMPLE_REPO, { excludeInternal: false, excludePatterns: [] });

    expect(source.fetch.mock.invocationCallOrder[0]).toBeLessThan(scan.mock.invocationCallOrder[0] ?? 0);
    expect(source.close).toHaveBeenCalledTimes(1);
  });

  it('reconciles the sample repository', async () => {
    const result = await check(sourceOf(), new RepoScanner(), SAMPLE_REPO, {
      excludeInternal: false,
      excludePatterns: ['orders.*'],
    });

    expect(result.findings.map((f) => [f.topic, f.status])).toEqual([
      ['payments', 'UNUSED'],
      ['orders', 'OK'],
    ]);
    expect(result.summary.filesScanned).toBe(3);
    expect(JSON.parse(checkToJson(result, true))).toHaveProperty('summary.repo_path', SAMPLE_REPO);
  });

  it('does not scan when the cluster cannot be read', async () => {
    const source = sourceOf();
    source.fetch.mockRejectedValue(new Error('cluster unreachable'));
    const scanner = new RepoScanner();
    const scan = vi.spyOn(scanner, 'scan');

    await expect(check(source, scanner, SAMPLE_REPO, { excludeInternal: false, excludePatterns: [] })).rejects.toThrow(
      'cluster unreachable',
    );
    expect(scan).not.toHaveBeenCalled();
    expect(source.close).toHaveBeenCalledTimes(1);
  });
});
