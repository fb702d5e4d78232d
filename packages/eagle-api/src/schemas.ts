/**
 * Schemas for the response fields the CLI reads directly.
 * Everything else is passed through untouched as JSON.
 */

import { z } from 'zod';

export const applicationInfoSchema = z
  .object({
    version: z.string(),
    buildVersion: z.string().optional(),
    platform: z.string().optional(),
  })
  .passthrough();

export const itemSummarySchema = z
  .object({
    id: z.string(),
    name: z.string(),
    ext: z.string(),
    url: z.string().optional(),
  })
  .passthrough();

export type ItemSummary = z.infer<typeof itemSummarySchema>;

export const itemListSchema = z.array(itemSummarySchema);

export interface FolderNode {
  id: string;
  name: string;
  children: FolderNode[];
}

export const folderNodeSchema: z.ZodType<FolderNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    id: z.string(),
    name: z.string(),
    children: z.array(folderNodeSchema).default([]),
  }),
);

export const folderListSchema = z.array(folderNodeSchema);

export const libraryInfoSchema = z
  .object({
    library: z.object({
      path: z.string(),
      name: z.string(),
    }),
  })
  .passthrough();

export const libraryHistorySchema = z.array(z.string());
