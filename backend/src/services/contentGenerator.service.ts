import type { Logger } from 'pino';
import { lookupCategory } from '../config/categories.js';
import type {
  GenerationFailure,
  GenerationReport,
  GenerationResult,
  GeneratorConfig,
  ObjectStore,
} from '../types/generation.js';
import { errorMessage } from '../utils/errors.js';
import { runPool } from '../utils/runPool.js';
import { buildOutputPath } from '../utils/slugify.js';
import { withTimeout } from '../utils/timeout.js';
import type { ArticleWriter } from './articleWriter.service.js';
import { renderPage } from './pageRenderer.service.js';
import { HTML_CONTENT_TYPE, PUBLIC_DAY_CACHE } from './storage.service.js';

export interface ContentGeneratorDeps {
  writer: ArticleWriter;
  store: ObjectStore;
  config: Pick<GeneratorConfig, 'concurrency' | 'storageTimeoutMs'>;
  logger?: Logger;
  now?: () => Date;
}

interface Pair {
  topic: string;
  category: string;
}

type PairOutcome =
  | { ok: true; result: GenerationResult }
  | { ok: false; failure: GenerationFailure };

export class ContentGeneratorService {
  private readonly writer: ArticleWriter;
  private readonly store: ObjectStore;
  private readonly config: ContentGeneratorDeps['config'];
  private readonly logger: Logger | null;
  private readonly now: () => Date;

  constructor({ writer, store, config, logger, now }: ContentGeneratorDeps) {
    this.writer = writer;
    this.store = store;
    this.config = config;
    this.logger = logger ?? null;
    this.now = now ?? (() => new Date());
  }

  /**
   * Generates and stores one page per (topic, category) pair. Never rejects
   * on a pair failure: each one is recorded in `failed` and the batch goes on.
   * Output keeps topic-major, category-minor input order.
   */
  async generate(topics: readonly string[], categories: readonly string[]): Promise<GenerationReport> {
    const pairs: Pair[] = topics.flatMap((topic) => categories.map((category) => ({ topic, category })));
    const outcomes: PairOutcome[] = new Array(pairs.length);
    const startedAt = Date.now();

    this.logger?.info(
      { topics: topics.length, categories: categories.length, pairs: pairs.length, concurrency: this.config.concurrency },
      '🚀 Starting content generation batch'
    );

    await runPool(pairs, this.config.concurrency, async (pair, index) => {
      outcomes[index] = await this.processPair(pair);
    });

    const generated: GenerationResult[] = [];
    const failed: GenerationFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) generated.push(outcome.result);
      else failed.push(outcome.failure);
    }

    this.logger?.info(
      { generated: generated.length, failed: failed.length, durationMs: Date.now() - startedAt },
      '✅ Content generation batch finished'
    );

    return { generated, failed, totalGenerated: generated.length };
  }

  private async processPair({ topic, category }: Pair): Promise<PairOutcome> {
    const startedAt = Date.now();
    this.logger?.debug({ topic, category }, '▶ Generating page');
    try {
      const spec = lookupCategory(category);
      const article = await this.writer.write(topic, spec);
      const html = renderPage({
        topic,
        categoryLabel: spec.label,
        bodyHtml: article.bodyHtml,
        metaDescription: article.metaDescription,
      });
      const outputPath = buildOutputPath(topic, category);

      await withTimeout(
        this.store.put({ key: outputPath, body: html, contentType: HTML_CONTENT_TYPE, cacheControl: PUBLIC_DAY_CACHE }),
        this.config.storageTimeoutMs,
        'Storage write'
      );

      this.logger?.info({ topic, category, outputPath, durationMs: Date.now() - startedAt }, '📄 Generated page');
      return { ok: true, result: { topic, category, outputPath, createdAt: this.now().toISOString() } };
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.warn({ topic, category, error: message }, '⚠ Page generation failed');
      return { ok: false, failure: { topic, category, error: message } };
    }
  }
}
