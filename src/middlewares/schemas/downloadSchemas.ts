/**
 * Download Validation Schemas
 * Zod schemas for download submissions and task queries.
 */

import { z } from "zod";
import { TASK_STATUSES } from "../../types/task.js";

const httpUrl = z
  .string()
  .trim()
  .url("Must be a valid URL")
  .refine((value) => /^https?:\/\//i.test(value), { message: "URL must use http or https" });

const assetFlags = {
  video: z.boolean().default(true),
  audio: z.boolean().default(true),
  subtitles: z.boolean().default(true),
};

export const downloadSchema = z.object({
  url: httpUrl,
  ...assetFlags,
});

export const batchDownloadSchema = z.object({
  urls: z.array(httpUrl).min(1, "At least one URL is required"),
  ...assetFlags,
});

export const videoInfoQuerySchema = z.object({
  url: httpUrl,
});

export const listTasksQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export type DownloadBody = z.infer<typeof downloadSchema>;
export type BatchDownloadBody = z.infer<typeof batchDownloadSchema>;
