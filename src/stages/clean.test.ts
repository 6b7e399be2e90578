/**
 * Tests for the cleaning stage
 */

import { describe, it, expect } from '@jest/globals';
import { createRawText } from '../schemas/records.js';
import { CleaningError } from '../pipeline/errors.js';
import { RecordingLogger } from '../../tests/helpers/recording-logger.js';
import { CleaningStage, cleanText } from './clean.js';

describe('cleanText', () => {
  it('should strip, collapse and trim', () => {
    expect(cleanText('  <b>Hi</b>\n\tThere  ')).toEqual({
      content: 'Hi There',
      operations: ['html_stripping', 'whitespace_collapse', 'trim'],
    });
  });

  it('should report no operations for clean text', () => {
    expect(cleanText('Already clean.')).toEqual({ content: 'Already clean.', operations: [] });
  });

  it('should accept empty and whitespace-only input', () => {
    expect(cleanText('')).toEqual({ content: '', operations: [] });
    expect(cleanText(' \n ')).toEqual({ content: '', operations: ['whitespace_collapse', 'trim'] });
  });

  it('should strip markup that only appears after normalization', () => {
    expect(cleanText('＜b＞Hi＜/b＞')).toEqual({
      content: 'Hi',
      operations: ['html_stripping', 'unicode_normalization'],
    });
  });

  it('should remove zero-width characters including a leading BOM', () => {
    expect(cleanText('\uFEFFHel\u200Blo')).toEqual({ content: 'Hello', operations: ['zero_width_removal'] });
  });

  it('should be idempotent', () => {
    const inputs = [
      '  <b>Hi</b>\n\tThere  ',
      '\uFF1Cb\uFF1EHi\uFF1C/b\uFF1E',
      '<p>a\u200B \u3000 b</p> <!-- note -->',
      'cafe\u0301 \uFB01ne',
      'Great &amp; amazing',
      '&lt;b&gt;bold&lt;/b&gt; &amp;lt; tea&nbsp;&nbsp;time',
    ];

    for (const input of inputs) {
      const once = cleanText(input);
      const twice = cleanText(once.content);
      expect(twice.content).toBe(once.content);
      expect(twice.operations).toEqual([]);
    }
  });

  it('should decode character references after stripping tags', () => {
    expect(cleanText('<p>Great &amp; amazing</p>')).toEqual({
      content: 'Great & amazing',
      operations: ['html_stripping'],
    });
  });

  it('should collapse decoded non-breaking spaces', () => {
    expect(cleanText('tea&nbsp;&nbsp;time').content).toBe('tea time');
  });

  it('should keep escaped markup escaped', () => {
    expect(cleanText('&lt;b&gt;bold&lt;/b&gt;')).toEqual({
      content: '&lt;b>bold&lt;/b>',
      operations: ['html_stripping'],
    });
  });

  it('should throw for malformed markup', () => {
    expect(() => cleanText('text <a href="x"')).toThrow('unterminated HTML tag at position 5');
  });
});

describe('CleaningStage', () => {
  const stage = new CleaningStage();

  it('should produce a frozen cleaned record', async () => {
    const raw = createRawText({ content: ' <i>ok</i> ', source: 'review', metadata: { lang: 'en' } });
    const logger = new RecordingLogger();

    const cleaned = await stage.process(raw, { traceId: 'trace-1', logger });

    expect(cleaned.kind).toBe('cleaned_text');
    expect(cleaned.content).toBe('ok');
    expect(cleaned.originalContent).toBe(' <i>ok</i> ');
    expect(cleaned.source).toBe('review');
    expect(cleaned.traceId).toBe('trace-1');
    expect(cleaned.metadata).toEqual({ lang: 'en' });
    expect(cleaned.operations).toEqual(['html_stripping', 'trim']);
    expect(Object.isFrozen(cleaned)).toBe(true);
    expect(logger.messages('debug')).toEqual(['Text cleaned']);
  });

  it('should wrap failures in a CleaningError carrying the original text', async () => {
    const raw = createRawText({ content: 'bad <a', source: 'review' });
    const logger = new RecordingLogger();

    const failure = stage.process(raw, { traceId: 'trace-2', logger });

    await expect(failure).rejects.toBeInstanceOf(CleaningError);
    await expect(failure).rejects.toMatchObject({
      message: 'Cleaning failed: unterminated HTML tag at position 4',
      stage: 'cleaning',
      traceId: 'trace-2',
      originalText: 'bad <a',
    });
    expect(logger.lines).toEqual([
      {
        level: 'warn',
        message: 'Input rejected by cleaning',
        fields: { source: 'review', reason: 'unterminated HTML tag at position 4' },
      },
    ]);
  });

  it('should use a custom name in errors', async () => {
    const named = new CleaningStage({ name: 'pre-clean' });
    const raw = createRawText({ content: '<!-- open', source: 's' });

    await expect(named.process(raw, { traceId: 't', logger: new RecordingLogger() })).rejects.toMatchObject({
      stage: 'pre-clean',
    });
  });
});
