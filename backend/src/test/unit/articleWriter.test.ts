import { describe, it, expect } from '@jest/globals';
import { lookupCategory } from '../../config/categories.js';
import { ArticleWriter, cleanArticleBody, cleanMetaDescription } from '../../services/articleWriter.service.js';
import type { Inferencer } from '../../types/generation.js';
import { InferenceError, TimeoutError } from '../../utils/errors.js';
import { FakeInferencer, isMetaPrompt } from '../helpers/fakes.js';

describe('ArticleWriter', () => {
  const facts = lookupCategory('facts');

  it('builds the article prompt from the category template plus HTML instructions', () => {
    const writer = new ArticleWriter(new FakeInferencer(), 1000);
    const prompt = writer.buildArticlePrompt('Volcanoes', facts);
    expect(prompt.startsWith('Write an engaging article presenting the most interesting and surprising facts about Volcanoes.')).toBe(true);
    expect(prompt).toContain('- A compelling <h1> title');
    expect(prompt).not.toContain('{topic}');
  });

  it('asks for the meta description separately, using the lowercased label', () => {
    const writer = new ArticleWriter(new FakeInferencer(), 1000);
    const prompt = writer.buildMetaPrompt('Volcanoes', facts);
    expect(prompt).toContain('for a blog article about "Volcanoes" focusing on interesting facts.');
  });

  it('makes two independent calls and returns body and meta', async () => {
    const inferencer = new FakeInferencer({ body: '<p>Lava.</p>', meta: 'All about lava.' });
    const writer = new ArticleWriter(inferencer, 1000);

    const article = await writer.write('Volcanoes', facts);

    expect(article).toEqual({ bodyHtml: '<p>Lava.</p>', metaDescription: 'All about lava.' });
    expect(inferencer.prompts).toHaveLength(2);
    expect(inferencer.prompts.filter(isMetaPrompt)).toHaveLength(1);
  });

  it('rejects an empty body', async () => {
    const writer = new ArticleWriter(new FakeInferencer({ body: '```html\n```' }), 1000);
    await expect(writer.write('Volcanoes', facts)).rejects.toThrow(InferenceError);
  });

  it('times out a slow model call', async () => {
    const never: Inferencer = { generateText: () => new Promise<string>(() => undefined) };
    const writer = new ArticleWriter(never, 20);
    await expect(writer.write('Volcanoes', facts)).rejects.toThrow(TimeoutError);
  });
});

describe('cleanArticleBody', () => {
  it('removes a markdown code fence', () => {
    expect(cleanArticleBody('```html\n<h1>Hi</h1>\n```')).toBe('<h1>Hi</h1>');
  });

  it('leaves plain HTML alone', () => {
    expect(cleanArticleBody('  <p>Plain</p>\n')).toBe('<p>Plain</p>');
  });
});

describe('cleanMetaDescription', () => {
  it('strips quotes and collapses whitespace', () => {
    expect(cleanMetaDescription('  "Discover   volcano\nfacts."  ')).toBe('Discover volcano facts.');
  });

  it('caps the length at 160 characters', () => {
    expect(cleanMetaDescription('x'.repeat(200))).toHaveLength(160);
  });
});
