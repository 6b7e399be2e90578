/**
 * End-to-end pipeline tests: cleaning, sentiment and storage wired together
 * over real connectors.
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { createLogger } from '../../src/logging/logger.js';
import { PipelineOrchestrator } from '../../src/pipeline/orchestrator.js';
import { PipelineConfigurationError, StorageError } from '../../src/pipeline/errors.js';
import { submitWithRetry } from '../../src/pipeline/retry.js';
import { processBatch } from '../../src/pipeline/batch.js';
import { createRawText } from '../../src/schemas/records.js';
import { CleaningStage, cleanText } from '../../src/stages/clean.js';
import { SentimentStage } from '../../src/stages/sentiment.js';
import { createLexicon } from '../../src/stages/sentiment/lexicon.js';
import { StorageStage } from '../../src/stages/store.js';
import type { StoreConnector } from '../../src/storage/connector.js';
import { InMemoryStoreConnector, MemoryStoreError } from '../../src/storage/memory.js';
import { SqliteStoreConnector } from '../../src/storage/sqlite.js';
import type { Logger } from '../../src/pipeline/types.js';

type LogEntry = Record<string, unknown>;

function jsonLines(): { destination: { write(line: string): void }; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null) {
          entries.push({ ...parsed });
        }
      },
    },
    entries,
  };
}

function pipeline(connector: StoreConnector, logger?: Logger): PipelineOrchestrator {
  return new PipelineOrchestrator([new CleaningStage(), new SentimentStage(), new StorageStage(connector)], { logger });
}

describe('text pipeline', () => {
  const opened: StoreConnector[] = [];

  function sqlite(): SqliteStoreConnector {
    const store = new SqliteStoreConnector({ filename: ':memory:' });
    opened.push(store);
    return store;
  }

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((store) => store.close()));
  });

  it('should clean, score and store a record in SQLite', async () => {
    const store = sqlite();
    const original = '<p>Great  product!</p>\u200B';

    const result = await pipeline(store).run(createRawText({ content: original, source: 'review' }), {
      traceId: 'trace-e2e',
    });

    expect(result).toMatchObject({
      kind: 'processed_result',
      content: 'Great product!',
      originalContent: original,
      sentiment: 'positive',
      sentimentScore: 1,
      confidence: 0.2,
      traceId: 'trace-e2e',
    });

    const stored = await store.findById(result.storageId);
    expect(stored).toMatchObject({
      storageId: result.storageId,
      traceId: 'trace-e2e',
      source: 'review',
      originalContent: original,
      cleanedContent: 'Great product!',
      sentiment: 'positive',
    });
  });

  it('should store a positive review', async () => {
    const store = sqlite();

    const outcome = await pipeline(store).submit(
      createRawText({ content: '<p>This product is amazing!</p>', source: 'review' })
    );

    expect(outcome.status).toBe('completed');
    expect(outcome.stagesExecuted).toEqual(['cleaning', 'sentiment', 'storage']);
    if (outcome.status === 'completed') {
      expect(outcome.result.content).toBe('This product is amazing!');
      expect(outcome.result.sentiment).toBe('positive');
      expect(outcome.result.sentimentScore).toBeGreaterThan(0.1);
      expect(outcome.result.storageId).not.toBe('');
    }
  });

  it('should store blank input as neutral empty text', async () => {
    const store = sqlite();

    const result = await pipeline(store).run(createRawText({ content: '   ', source: 'test' }));

    expect(result).toMatchObject({ content: '', sentiment: 'neutral', sentimentScore: 0, confidence: 1 });
    expect(await store.findBySource('test')).toHaveLength(1);
  });

  it('should change only the scores when the lexicon is swapped', async () => {
    const raw = createRawText({ content: 'This product is amazing!', source: 'review' });
    const lexicon = createLexicon({ positive: ['product'], negative: ['amazing'] });
    const swapped = new PipelineOrchestrator([
      new CleaningStage(),
      new SentimentStage({ lexicon }),
      new StorageStage(new InMemoryStoreConnector()),
    ]);

    const standard = await pipeline(new InMemoryStoreConnector()).run(raw, { traceId: 'trace-a' });
    const alternate = await swapped.run(raw, { traceId: 'trace-b' });

    expect(standard.sentiment).toBe('positive');
    expect(alternate.sentiment).toBe('neutral');
    expect(alternate.sentimentScore).toBe(0);
    expect(Object.keys(alternate).sort()).toEqual(Object.keys(standard).sort());
    expect(alternate.content).toBe(standard.content);
  });

  it('should score decoded text rather than entity names', async () => {
    const lexicon = createLexicon({ positive: ['great'], negative: ['amp'] });
    const orchestrator = new PipelineOrchestrator([
      new CleaningStage(),
      new SentimentStage({ lexicon }),
      new StorageStage(new InMemoryStoreConnector()),
    ]);

    const result = await orchestrator.run(createRawText({ content: '<p>Great &amp; amazing</p>', source: 'review' }));

    expect(result.content).toBe('Great & amazing');
    expect(result.sentiment).toBe('positive');
    expect(result.sentimentScore).toBe(1);
  });

  it('should leave cleaned output unchanged when cleaned again', async () => {
    const outcome = await pipeline(new InMemoryStoreConnector()).submit(
      createRawText({ content: ' \uFF1Cb\uFF1EBold\uFF1C/b\uFF1E   move ', source: 'chat' })
    );

    expect(outcome.status).toBe('completed');
    if (outcome.status === 'completed') {
      expect(outcome.result.content).toBe('Bold move');
      expect(cleanText(outcome.result.content)).toEqual({ content: 'Bold move', operations: [] });
    }
  });

  it('should bind the trace id onto every log line of a run', async () => {
    const { destination, entries } = jsonLines();
    const logger = createLogger({ level: 'debug', destination });

    await pipeline(new InMemoryStoreConnector(), logger).submit(createRawText({ content: 'fine', source: 'test' }), {
      traceId: 'trace-logged',
    });

    expect(entries.length).toBeGreaterThan(0);
    expect(entries.filter((entry) => entry.traceId !== 'trace-logged')).toEqual([]);
    expect(entries.map((entry) => entry.msg)).toEqual(expect.arrayContaining(['Submission started', 'Record stored']));
  });

  it('should keep no row when the write is rejected', async () => {
    const store = sqlite();
    const orchestrator = pipeline(store);

    await orchestrator.run(createRawText({ content: 'good', source: 'dup' }), { traceId: 'trace-dup' });
    const second = await orchestrator.submit(createRawText({ content: 'bad', source: 'dup' }), {
      traceId: 'trace-dup',
    });

    expect(second.status).toBe('failed');
    if (second.status === 'failed') {
      expect(second.failedStage).toBe('storage');
      expect(second.error).toBeInstanceOf(StorageError);
      expect(second.error.retryable).toBe(false);
    }
    const third = await orchestrator.submit(createRawText({ content: 'bad', source: 'dup' }), {
      traceId: 'trace-dup',
    });
    expect(third.status).toBe('failed');
    if (third.status === 'failed') {
      expect(third.error.retryable).toBe(false);
    }
    expect((await store.findBySource('dup')).map((row) => row.cleanedContent)).toEqual(['good']);
  });

  it('should roll back when the commit fails', async () => {
    const store = new InMemoryStoreConnector();
    store.failNext('commit', new MemoryStoreError('disk full', false));

    const outcome = await pipeline(store).submit(createRawText({ content: 'good', source: 'test' }));

    expect(outcome.status).toBe('failed');
    expect(store.size()).toBe(0);
    expect(store.getOpenTransactionCount()).toBe(0);
  });

  it('should retry transient storage failures under the same trace id', async () => {
    const store = new InMemoryStoreConnector();
    store.failNext('write', new MemoryStoreError('connection reset', true));
    store.failNext('write', new MemoryStoreError('connection reset', true));
    const traceIds: string[] = [];

    const outcome = await submitWithRetry(pipeline(store), createRawText({ content: 'good', source: 'test' }), {
      traceId: 'trace-retry',
      maxRetries: 2,
      baseDelayMs: 1,
      maxDelayMs: 1,
      onRetry: (failed) => traceIds.push(failed.traceId),
    });

    expect(outcome.status).toBe('completed');
    expect(outcome.attempts).toBe(3);
    expect(traceIds).toEqual(['trace-retry', 'trace-retry']);
    expect(store.size()).toBe(1);
  });

  it('should store every valid record of a batch despite failures', async () => {
    const store = sqlite();

    const summary = await processBatch(
      pipeline(store),
      ['good', '<a href="x"', 'awful', 'fine'].map((content) => createRawText({ content, source: 'batch' })),
      { concurrency: 2, retry: { maxRetries: 0 } }
    );

    expect(summary).toMatchObject({ total: 4, completed: 3, failed: 1 });
    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(['completed', 'failed', 'completed', 'completed']);
    expect(await store.findBySource('batch')).toHaveLength(3);
  });

  it('should refuse a stage list that does not chain', () => {
    const store = new InMemoryStoreConnector();

    expect(() => new PipelineOrchestrator([new CleaningStage(), new StorageStage(store)])).toThrow(
      PipelineConfigurationError
    );
  });
});
