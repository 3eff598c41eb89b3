import { z } from 'zod';
import { CONTENT_TYPES } from '../types';
import { STRATEGY_NAMES } from './extractors/strategy';

// Wire format between the strategy pool and its worker threads

export const StrategyTaskSchema = z.object({
  strategy: z.enum(STRATEGY_NAMES),
  url: z.string(),
  html: z.string(),
});

export const WorkerRequestSchema = z.object({
  id: z.number().int(),
  task: StrategyTaskSchema,
});

const ContentItemSchema = z.object({
  title: z.string(),
  content: z.string(),
  contentType: z.enum(CONTENT_TYPES),
  sourceUrl: z.string(),
});

export const WorkerReplySchema = z.object({
  id: z.number().int(),
  item: ContentItemSchema.nullable(),
});

export type StrategyTask = z.infer<typeof StrategyTaskSchema>;
export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;
export type WorkerReply = z.infer<typeof WorkerReplySchema>;
