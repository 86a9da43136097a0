export const CATEGORY_IDS = [
  'facts',
  'history',
  'future_analysis',
  'how_it_works',
  'comparisons',
  'common_myths',
  'getting_started',
] as const;

export type CategoryId = (typeof CATEGORY_IDS)[number];

export interface CategorySpec {
  readonly id: CategoryId;
  readonly label: string;
  /** Contains a `{topic}` placeholder. */
  readonly promptTemplate: string;
}

export interface GenerationRequest {
  topics: string[];
  categories: string[];
}

export interface GenerationResult {
  topic: string;
  category: string;
  outputPath: string;
  createdAt: string;
}

export interface GenerationFailure {
  topic: string;
  category: string;
  error: string;
}

export interface GenerationReport {
  generated: GenerationResult[];
  failed: GenerationFailure[];
  totalGenerated: number;
}

export interface GeneratedArticle {
  bodyHtml: string;
  metaDescription: string;
}

export interface Inferencer {
  generateText(prompt: string): Promise<string>;
}

export interface StoredObject {
  key: string;
  body: string;
  contentType: string;
  cacheControl: string;
}

export interface ObjectStore {
  put(object: StoredObject): Promise<void>;
}

export type StorageDriver = 's3' | 'local';

export interface GeneratorConfig {
  readonly environment: string;
  readonly bucket: string;
  readonly region: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxOutputTokens: number;
  readonly storageDriver: StorageDriver;
  readonly localOutputDir: string;
  readonly concurrency: number;
  readonly inferenceTimeoutMs: number;
  readonly storageTimeoutMs: number;
}
