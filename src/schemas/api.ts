import { z } from "@hono/zod-openapi";

export const ErrorSchema = z.object({
  success: z.literal(false),
  error: z.string(),
});

export const IngestRequestSchema = z.object({
  directory: z
    .string()
    .min(1)
    .optional()
    .openapi({
      description:
        "Subdirectory of the server's data directory. Paths outside it are rejected.",
      example: "handbooks",
    }),
});

const CompatibilitySchema = z.object({
  action: z.enum(["created", "reused", "unverified", "discarded"]),
  targetDimension: z.number(),
  existingDimension: z.number().nullable(),
});

export const IngestResponseSchema = z.object({
  success: z.literal(true),
  load: z.object({
    loaded: z.array(z.string()),
    skipped: z.array(z.string()),
    failed: z.array(z.object({ path: z.string(), error: z.string() })),
    documentCount: z.number(),
  }),
  ingestion: z.object({
    chunkCount: z.number(),
    batchCount: z.number(),
    dimension: z.number(),
    compatibility: CompatibilitySchema,
    processingTimeMs: z.number(),
  }),
  message: z.string(),
});

export const AskRequestSchema = z.object({
  query: z.string().min(1).openapi({ example: "What does the handbook say about leave?" }),
});

export const AskResponseSchema = z.object({
  success: z.literal(true),
  answer: z.string(),
  sources: z.array(z.string()),
  chunks: z.array(
    z.object({
      id: z.string(),
      content: z.string(),
      similarity: z.number(),
      source: z.string(),
      page: z.number().optional(),
    }),
  ),
});

export const HealthResponseSchema = z.object({
  status: z.string(),
  version: z.string(),
  uptime: z.number(),
});

export const StatsResponseSchema = z.object({
  success: z.literal(true),
  index: z.object({
    recordCount: z.number(),
    dimension: z.number().nullable(),
  }),
});
