import type { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';
import { z } from 'zod';
import { isCategoryId, listCategories } from '../config/categories.js';
import { createError, errorBody } from '../middleware/errorHandler.js';
import type { ContentGeneratorService } from '../services/contentGenerator.service.js';
import type { GenerationReport, GenerationRequest, GeneratorConfig } from '../types/generation.js';

const MAX_TOPICS = 50;
const MAX_CATEGORIES = 7;

const generateInputSchema = z.object({
  topics: z
    .array(z.string().trim().min(1, 'Topics must be non-empty strings').max(200, 'Topic too long'), {
      required_error: 'At least one topic is required',
      invalid_type_error: 'Topics must be an array of strings',
    })
    .min(1, 'At least one topic is required')
    .max(MAX_TOPICS, `Maximum ${MAX_TOPICS} topics allowed`),
  categories: z
    .array(z.string().trim().min(1, 'Categories must be non-empty strings'), {
      required_error: 'At least one category is required',
      invalid_type_error: 'Categories must be an array of strings',
    })
    .min(1, 'At least one category is required')
    .max(MAX_CATEGORIES, `Maximum ${MAX_CATEGORIES} categories allowed`),
});

export interface GenerateResponseBody {
  success: boolean;
  generated: { topic: string; category: string; output_path: string; created_at: string }[];
  failed: { topic: string; category: string; error: string }[];
  total_generated: number;
  message: string;
}

export function toResponseBody(report: GenerationReport): GenerateResponseBody {
  const failedCount = report.failed.length;
  return {
    success: failedCount === 0,
    generated: report.generated.map((result) => ({
      topic: result.topic,
      category: result.category,
      output_path: result.outputPath,
      created_at: result.createdAt,
    })),
    failed: report.failed.map((failure) => ({ ...failure })),
    total_generated: report.totalGenerated,
    message:
      failedCount > 0
        ? `Generated ${report.totalGenerated} pages. ${failedCount} failed.`
        : `Successfully generated ${report.totalGenerated} pages.`,
  };
}

export interface ContentControllerDeps {
  generator: ContentGeneratorService;
  config: Pick<GeneratorConfig, 'storageDriver' | 'bucket'>;
  logger: Logger;
}

export class ContentController {
  private readonly generator: ContentGeneratorService;
  private readonly config: ContentControllerDeps['config'];
  private readonly logger: Logger;

  constructor({ generator, config, logger }: ContentControllerDeps) {
    this.generator = generator;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Generate pages for every topic/category pair
   * POST /generate
   */
  generate = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const validationResult = generateInputSchema.safeParse(req.body ?? {});
      if (!validationResult.success) {
        const errorMessage = validationResult.error.errors.map((err) => err.message).join(', ');
        throw createError(errorMessage, 400);
      }

      const { topics, categories }: GenerationRequest = validationResult.data;

      const invalidCategories = categories.filter((category) => !isCategoryId(category));
      if (invalidCategories.length > 0) {
        throw createError(`Invalid categories: ${invalidCategories.join(', ')}`, 400);
      }

      if (this.config.storageDriver === 's3' && !this.config.bucket) {
        throw createError('OUTPUT_BUCKET_NAME not configured', 500);
      }

      this.logger.info({ topics, categories }, '📚 Generating content');
      const report = await this.generator.generate(topics, categories);

      res.status(200).json(toResponseBody(report));
    } catch (error) {
      next(error);
    }
  };

  /**
   * List the supported categories
   * GET /categories
   */
  listCategories = (_req: Request, res: Response): void => {
    res.json({
      success: true,
      categories: listCategories().map(({ id, label }) => ({ id, label })),
    });
  };

  methodNotAllowed = (_req: Request, res: Response): void => {
    res.status(405).json(errorBody(405, 'Method not allowed'));
  };
}
