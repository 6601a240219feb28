/**
 * @fileoverview Storage shape of a task record
 *
 * Zod schemas for decoding the persisted collection.
 */

import { z } from 'zod';

/**
 * One stored record. `description` may be null or missing.
 */
export const storedTaskSchema = z.object({
  id: z.string().min(1, 'id must not be empty'),
  title: z.string().refine((title) => title.trim().length > 0, 'title must not be blank'),
  description: z.string().nullable().optional(),
  completed: z.boolean(),
  createdAt: z.string().datetime({ offset: true, message: 'createdAt is not a valid timestamp' }),
});

export const storedCollectionSchema = z.array(z.unknown());

export type StoredTask = z.infer<typeof storedTaskSchema>;
