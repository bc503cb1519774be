/**
 * 라우터 공통 Query 스키마
 */

import { z } from "zod";
import { OutputFormatSchema, ScrapeJobStatusSchema } from "@/core/domain/search/ScrapeJob";

export const ListJobsQuerySchema = z.object({
  status: ScrapeJobStatusSchema.optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
});

export const ResultsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(1000).default(100),
});

export const DownloadQuerySchema = z.object({
  format: OutputFormatSchema.optional(),
});
