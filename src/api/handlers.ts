import type { OpenAPIHono } from "@hono/zod-openapi";
import { ConfigurationError, errorMessage } from "../errors";
import type { RagPace } from "../RagPace";
import {
  askRoute,
  healthRoute,
  ingestRoute,
  statsRoute,
} from "./routes";

export const API_VERSION = "1.0.0";

function errorBody(error: unknown) {
  return { success: false as const, error: errorMessage(error) };
}

export function registerHandlers(
  app: OpenAPIHono,
  rag: RagPace,
  startTime: number,
) {
  app.openapi(healthRoute, (c) => {
    return c.json(
      {
        status: "ok",
        version: API_VERSION,
        uptime: Math.floor((Date.now() - startTime) / 1000),
      },
      200,
    );
  });

  app.openapi(ingestRoute, async (c) => {
    try {
      const { directory } = c.req.valid("json");
      const { load, ingestion } = await rag.ingestDirectory(
        rag.resolveDataPath(directory),
      );
      return c.json(
        {
          success: true as const,
          load: {
            loaded: load.loaded,
            skipped: load.skipped,
            failed: load.failed,
            documentCount: load.documents.length,
          },
          ingestion,
          message: `Ingested ${ingestion.chunkCount} chunks in ${ingestion.batchCount} batches.`,
        },
        200,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return c.json(errorBody(error), 500);
      }
      return c.json(errorBody(error), 400);
    }
  });

  app.openapi(askRoute, async (c) => {
    try {
      const { query } = c.req.valid("json");
      const { answer, sources, chunks } = await rag.ask(query);
      return c.json(
        {
          success: true as const,
          answer,
          sources,
          chunks: chunks.map((chunk) => ({
            id: chunk.id,
            content: chunk.content,
            similarity: chunk.similarity,
            source: chunk.metadata.source,
            page: chunk.metadata.page,
          })),
        },
        200,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return c.json(errorBody(error), 500);
      }
      return c.json(errorBody(error), 400);
    }
  });

  app.openapi(statsRoute, async (c) => {
    try {
      const index = await rag.getStats();
      return c.json({ success: true as const, index }, 200);
    } catch (error) {
      return c.json(errorBody(error), 400);
    }
  });
}
