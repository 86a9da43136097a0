import type { Logger } from 'pino';
import { fillTemplate } from '../config/categories.js';
import type { CategorySpec, GeneratedArticle, Inferencer } from '../types/generation.js';
import { InferenceError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';

export const META_DESCRIPTION_MAX_LENGTH = 160;

const ARTICLE_FORMAT_INSTRUCTIONS = `

Format the article in clean HTML suitable for a blog post. Include:
- A compelling <h1> title
- Use <h2> and <h3> for section headers
- Use <p> tags for paragraphs
- Use <ul>/<ol> and <li> for lists where appropriate
- Use <strong> and <em> for emphasis
- Do NOT include <html>, <head>, or <body> tags - just the article content
- Make the content engaging, well-researched, and approximately 800-1200 words`;

/** Strips a ```html ... ``` wrapper that models sometimes add. */
export function cleanArticleBody(raw: string): string {
  const fenced = raw.trim().match(/^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/);
  return (fenced?.[1] ?? raw).trim();
}

export function cleanMetaDescription(raw: string): string {
  const unquoted = raw.trim().replace(/^["'“]+|["'”]+$/g, '').replace(/\s+/g, ' ').trim();
  return unquoted.slice(0, META_DESCRIPTION_MAX_LENGTH).trim();
}

export class ArticleWriter {
  private readonly inferencer: Inferencer;
  private readonly timeoutMs: number;
  private readonly logger: Logger | null;

  constructor(inferencer: Inferencer, timeoutMs: number, logger?: Logger) {
    this.inferencer = inferencer;
    this.timeoutMs = timeoutMs;
    this.logger = logger ?? null;
  }

  buildArticlePrompt(topic: string, spec: CategorySpec): string {
    return fillTemplate(spec, topic) + ARTICLE_FORMAT_INSTRUCTIONS;
  }

  buildMetaPrompt(topic: string, spec: CategorySpec): string {
    return `Write a compelling meta description (150-160 characters) for a blog article about "${topic}" focusing on ${spec.label.toLowerCase()}.
The description should be engaging and include the main keyword. Return ONLY the meta description text, nothing else.`;
  }

  /** Body and meta description come from two independent calls. */
  async write(topic: string, spec: CategorySpec): Promise<GeneratedArticle> {
    const [rawBody, rawMeta] = await Promise.all([
      withTimeout(this.inferencer.generateText(this.buildArticlePrompt(topic, spec)), this.timeoutMs, 'Article generation'),
      withTimeout(this.inferencer.generateText(this.buildMetaPrompt(topic, spec)), this.timeoutMs, 'Meta description generation'),
    ]);

    const bodyHtml = cleanArticleBody(rawBody);
    const metaDescription = cleanMetaDescription(rawMeta);

    if (!bodyHtml) {
      throw new InferenceError('Model returned an empty article body');
    }
    if (!metaDescription) {
      throw new InferenceError('Model returned an empty meta description');
    }

    this.logger?.debug({ topic, category: spec.id, bodyLength: bodyHtml.length }, '📝 Article written');
    return { bodyHtml, metaDescription };
  }
}
