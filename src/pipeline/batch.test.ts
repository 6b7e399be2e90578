/**
 * Tests for the batch runner
 */

import { describe, it, expect } from '@jest/globals';
import { createRawText } from '../schemas/records.js';
import { CleaningStage } from '../stages/clean.js';
import { SentimentStage } from '../stages/sentiment.js';
import { StorageStage } from '../stages/store.js';
import { InMemoryStoreConnector } from '../storage/memory.js';
import { gateStage } from '../../tests/helpers/stages.js';
import { PipelineOrchestrator } from './orchestrator.js';
import { processBatch } from './batch.js';
import type { RetriedOutcome } from './retry.js';

describe('processBatch', () => {
  it('should bound concurrency and keep input order', async () => {
    const store = new InMemoryStoreConnector();
    const gate = gateStage(15);
    const orchestrator = new PipelineOrchestrator([gate, new CleaningStage(), new SentimentStage(), new StorageStage(store)]);
    const contents = ['good', 'bad', 'meh', 'great', 'awful'];

    const summary = await processBatch(
      orchestrator,
      contents.map((content, index) => ({ raw: createRawText({ content, source: 'batch' }), traceId: `b-${index}` })),
      { concurrency: 2 }
    );

    expect(gate.maxInFlight()).toBe(2);
    expect(summary.total).toBe(5);
    expect(summary.completed).toBe(5);
    expect(summary.failed).toBe(0);
    expect(summary.outcomes.map((outcome) => outcome.traceId)).toEqual(['b-0', 'b-1', 'b-2', 'b-3', 'b-4']);
    expect(store.size()).toBe(5);
  });

  it('should isolate failing items', async () => {
    const store = new InMemoryStoreConnector();
    const orchestrator = new PipelineOrchestrator([new CleaningStage(), new SentimentStage(), new StorageStage(store)]);
    const settled: number[] = [];

    const summary = await processBatch(
      orchestrator,
      [
        createRawText({ content: 'fine', source: 'batch' }),
        createRawText({ content: 'broken <a', source: 'batch' }),
        createRawText({ content: 'also fine', source: 'batch' }),
      ],
      { onItemSettled: (_outcome: RetriedOutcome, index: number) => settled.push(index) }
    );

    expect(summary.completed).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(['completed', 'failed', 'completed']);
    expect([...settled].sort()).toEqual([0, 1, 2]);
    expect(store.size()).toBe(2);
  });

  it('should return an empty summary for no items', async () => {
    const orchestrator = new PipelineOrchestrator([
      new CleaningStage(),
      new SentimentStage(),
      new StorageStage(new InMemoryStoreConnector()),
    ]);

    const summary = await processBatch(orchestrator, []);

    expect(summary).toMatchObject({ total: 0, completed: 0, failed: 0, outcomes: [] });
  });
});
