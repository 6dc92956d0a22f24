import { swaggerUI } from "@hono/swagger-ui";
import { OpenAPIHono } from "@hono/zod-openapi";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { RagPace } from "../RagPace";
import { API_VERSION, registerHandlers } from "./handlers";

export function createApp(
  rag: RagPace,
  options: { requestLogging?: boolean; startTime?: number } = {},
): OpenAPIHono {
  const app = new OpenAPIHono();

  if (options.requestLogging ?? true) {
    app.use("*", logger());
  }
  app.use("*", cors());

  registerHandlers(app, rag, options.startTime ?? Date.now());

  app.doc("/openapi.json", {
    openapi: "3.1.0",
    info: {
      title: "ragpace API",
      version: API_VERSION,
      description:
        "Quota-paced document ingestion into a persisted vector index, with retrieval-augmented answers.",
    },
  });

  app.get("/docs", swaggerUI({ url: "/openapi.json" }));
  app.get("/", (c) => c.redirect("/docs"));

  return app;
}
