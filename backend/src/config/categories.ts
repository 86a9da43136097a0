import { CATEGORY_IDS, type CategoryId, type CategorySpec } from '../types/generation.js';
import { UnknownCategoryError } from '../utils/errors.js';

export const TOPIC_PLACEHOLDER = '{topic}';

const CATEGORY_REGISTRY: Readonly<Record<CategoryId, CategorySpec>> = Object.freeze({
  facts: Object.freeze({
    id: 'facts',
    label: 'Interesting Facts',
    promptTemplate:
      'Write an engaging article presenting the most interesting and surprising facts about {topic}. ' +
      'Group related facts under clear sections and explain why each one matters.',
  }),
  history: Object.freeze({
    id: 'history',
    label: 'History',
    promptTemplate:
      'Write an informative article about the history of {topic}. ' +
      'Cover its origins, key milestones, influential people and how it evolved into what it is today.',
  }),
  future_analysis: Object.freeze({
    id: 'future_analysis',
    label: 'Future Analysis',
    promptTemplate:
      'Write a forward-looking analysis of {topic}. ' +
      'Discuss current trends, emerging developments, open challenges and realistic predictions for the next decade.',
  }),
  how_it_works: Object.freeze({
    id: 'how_it_works',
    label: 'How It Works',
    promptTemplate:
      'Write a clear explainer on how {topic} works. ' +
      'Break the underlying mechanisms into steps a curious non-expert can follow, using analogies where helpful.',
  }),
  comparisons: Object.freeze({
    id: 'comparisons',
    label: 'Comparisons',
    promptTemplate:
      'Write a balanced comparison article about {topic} and its main alternatives. ' +
      'Compare strengths, weaknesses, costs and typical use cases, and finish with guidance on choosing between them.',
  }),
  common_myths: Object.freeze({
    id: 'common_myths',
    label: 'Common Myths',
    promptTemplate:
      'Write an article debunking common myths and misconceptions about {topic}. ' +
      'For each myth, state it plainly, then explain what is actually true.',
  }),
  getting_started: Object.freeze({
    id: 'getting_started',
    label: 'Getting Started',
    promptTemplate:
      "Write a beginner's guide to getting started with {topic}. " +
      'Include prerequisites, first steps, useful resources and mistakes to avoid.',
  }),
});

export const isCategoryId = (value: string): value is CategoryId =>
  CATEGORY_IDS.some((id) => id === value);

export function lookupCategory(categoryId: string): CategorySpec {
  if (!isCategoryId(categoryId)) {
    throw new UnknownCategoryError(categoryId);
  }
  return CATEGORY_REGISTRY[categoryId];
}

export const listCategories = (): CategorySpec[] => CATEGORY_IDS.map((id) => CATEGORY_REGISTRY[id]);

export const fillTemplate = (spec: CategorySpec, topic: string): string =>
  spec.promptTemplate.split(TOPIC_PLACEHOLDER).join(topic);
