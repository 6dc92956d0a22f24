import { createRoute } from "@hono/zod-openapi";
import {
  AskRequestSchema,
  AskResponseSchema,
  ErrorSchema,
  HealthResponseSchema,
  IngestRequestSchema,
  IngestResponseSchema,
  StatsResponseSchema,
} from "../schemas/api";

const errorResponses = {
  400: {
    description: "Bad request",
    content: { "application/json": { schema: ErrorSchema } },
  },
  500: {
    description: "Server misconfigured",
    content: { "application/json": { schema: ErrorSchema } },
  },
};

export const ingestRoute = createRoute({
  method: "post",
  path: "/api/ingest",
  tags: ["Ingestion"],
  summary: "Ingest a document directory",
  description:
    "Loads every supported file in the directory, chunks it, and embeds the chunks into the vector index in quota-paced batches.",
  request: {
    body: {
      content: { "application/json": { schema: IngestRequestSchema } },
      required: false,
    },
  },
  responses: {
    200: {
      description: "Successfully ingested",
      content: { "application/json": { schema: IngestResponseSchema } },
    },
    ...errorResponses,
  },
});

export const askRoute = createRoute({
  method: "post",
  path: "/api/ask",
  tags: ["Query"],
  summary: "Ask a question",
  description:
    "Retrieves the most similar chunks from the vector index and answers from them.",
  request: {
    body: { content: { "application/json": { schema: AskRequestSchema } } },
  },
  responses: {
    200: {
      description: "Answer generated",
      content: { "application/json": { schema: AskResponseSchema } },
    },
    ...errorResponses,
  },
});

export const statsRoute = createRoute({
  method: "get",
  path: "/api/stats",
  tags: ["System"],
  summary: "Index statistics",
  responses: {
    200: {
      description: "Record count and dimensionality",
      content: { "application/json": { schema: StatsResponseSchema } },
    },
    ...errorResponses,
  },
});

export const healthRoute = createRoute({
  method: "get",
  path: "/health",
  tags: ["System"],
  summary: "Health check",
  responses: {
    200: {
      description: "Service healthy",
      content: { "application/json": { schema: HealthResponseSchema } },
    },
  },
});
