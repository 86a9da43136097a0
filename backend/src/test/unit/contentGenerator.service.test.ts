import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import { ArticleWriter } from '../../services/articleWriter.service.js';
import { ContentGeneratorService } from '../../services/contentGenerator.service.js';
import type { Inferencer, ObjectStore } from '../../types/generation.js';
import { FakeInferencer, FIXED_NOW, MemoryObjectStore, silentLogger } from '../helpers/fakes.js';

const buildGenerator = (inferencer: Inferencer, store: ObjectStore, concurrency = 3) =>
  new ContentGeneratorService({
    writer: new ArticleWriter(inferencer, 1000, silentLogger),
    store,
    config: { concurrency, storageTimeoutMs: 1000 },
    logger: silentLogger,
    now: () => FIXED_NOW,
  });

describe('ContentGeneratorService', () => {
  it('generates, renders and stores a page', async () => {
    const store = new MemoryObjectStore();
    const generator = buildGenerator(
      new FakeInferencer({ body: 'Quantum computing uses qubits.', meta: 'Learn quantum computing facts.' }),
      store
    );

    const report = await generator.generate(['Quantum Computing'], ['facts']);

    expect(report).toEqual({
      generated: [
        {
          topic: 'Quantum Computing',
          category: 'facts',
          outputPath: 'output/quantum-computing-facts.html',
          createdAt: '2026-01-15T10:30:00.000Z',
        },
      ],
      failed: [],
      totalGenerated: 1,
    });

    const stored = store.objects.get('output/quantum-computing-facts.html');
    expect(stored?.contentType).toBe('text/html');
    expect(stored?.cacheControl).toBe('public, max-age=86400');
    expect(stored?.body).toContain('<meta name="description" content="Learn quantum computing facts.">');
    expect(stored?.body).toContain('Quantum computing uses qubits.');
    expect(stored?.body).toContain('<title>Quantum Computing - Interesting Facts</title>');
  });

  it('returns N x M records in topic-major, category-minor order', async () => {
    const generator = buildGenerator(new FakeInferencer(), new MemoryObjectStore(), 4);

    const report = await generator.generate(['Tea', 'Coffee', 'Cocoa'], ['history', 'facts']);

    expect(report.generated.length + report.failed.length).toBe(6);
    expect(report.generated.map(({ topic, category }) => `${topic}/${category}`)).toEqual([
      'Tea/history',
      'Tea/facts',
      'Coffee/history',
      'Coffee/facts',
      'Cocoa/history',
      'Cocoa/facts',
    ]);
    expect(report.totalGenerated).toBe(6);
  });

  it('isolates an inference failure to its own pair', async () => {
    const inferencer = new FakeInferencer({
      failWhen: { match: 'history of Coffee', error: new Error('ThrottlingException: Rate exceeded') },
    });
    const store = new MemoryObjectStore();
    const generator = buildGenerator(inferencer, store);

    const report = await generator.generate(['Tea', 'Coffee'], ['facts', 'history']);

    expect(report.failed).toEqual([
      { topic: 'Coffee', category: 'history', error: 'ThrottlingException: Rate exceeded' },
    ]);
    expect(report.generated.map((result) => result.outputPath)).toEqual([
      'output/tea-facts.html',
      'output/tea-history.html',
      'output/coffee-facts.html',
    ]);
    expect(report.generated.length + report.failed.length).toBe(4);
    expect(store.objects.has('output/coffee-history.html')).toBe(false);
  });

  it('records a storage failure and keeps going', async () => {
    const store = new MemoryObjectStore(['output/tea-facts.html']);
    const generator = buildGenerator(new FakeInferencer(), store);

    const report = await generator.generate(['Tea'], ['facts', 'history']);

    expect(report.failed).toEqual([
      { topic: 'Tea', category: 'facts', error: 'Access Denied for output/tea-facts.html' },
    ]);
    expect(report.generated).toHaveLength(1);
    expect(report.generated[0]?.category).toBe('history');
  });

  it('records an unknown category as a failure carrying that category', async () => {
    const inferencer = new FakeInferencer();
    const generator = buildGenerator(inferencer, new MemoryObjectStore());

    const report = await generator.generate(['Tea'], ['recipes', 'facts']);

    expect(report.failed).toEqual([{ topic: 'Tea', category: 'recipes', error: 'unknown category' }]);
    expect(report.generated.map((result) => result.category)).toEqual(['facts']);
    // only the known category reached the model: body + meta
    expect(inferencer.prompts).toHaveLength(2);
  });

  it('fails a pair whose storage write hangs', async () => {
    const hanging: ObjectStore = { put: () => new Promise<void>(() => undefined) };
    const generator = new ContentGeneratorService({
      writer: new ArticleWriter(new FakeInferencer(), 1000),
      store: hanging,
      config: { concurrency: 1, storageTimeoutMs: 10 },
    });

    const report = await generator.generate(['Tea'], ['facts']);

    expect(report.generated).toEqual([]);
    expect(report.failed).toEqual([{ topic: 'Tea', category: 'facts', error: 'Storage write timed out after 10ms' }]);
  });

  it('converts non-Error throws into a message', async () => {
    const inferencer: Inferencer = {
      generateText: () => Promise.reject('model unavailable'),
    };
    const generator = buildGenerator(inferencer, new MemoryObjectStore());

    const report = await generator.generate(['Tea'], ['facts']);

    expect(report.failed).toEqual([{ topic: 'Tea', category: 'facts', error: 'model unavailable' }]);
  });

  it('stores non-Latin topics under separate keys', async () => {
    const store = new MemoryObjectStore();
    const generator = buildGenerator(new FakeInferencer(), store);

    const report = await generator.generate(['日本の歴史', 'Историяя', 'قهوة'], ['facts']);

    expect(report.generated.map((result) => result.outputPath)).toEqual([
      'output/日本の歴史-facts.html',
      'output/историяя-facts.html',
      'output/قهوة-facts.html',
    ]);
    expect(store.objects.size).toBe(3);
  });

  it('logs the start and the outcome of every pair', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
    const generator = new ContentGeneratorService({
      writer: new ArticleWriter(new FakeInferencer(), 1000),
      store: new MemoryObjectStore(),
      config: { concurrency: 1, storageTimeoutMs: 1000 },
      logger,
    });

    await generator.generate(['Tea'], ['facts', 'recipes']);

    const entries = lines.map((line) => JSON.parse(line));
    const pairEvents = entries
      .filter((entry) => entry.topic === 'Tea')
      .map((entry) => `${entry.category} ${entry.msg}`);
    expect(pairEvents).toEqual([
      'facts ▶ Generating page',
      'facts 📄 Generated page',
      'recipes ▶ Generating page',
      'recipes ⚠ Page generation failed',
    ]);
  });
});
