import { serve } from "@hono/node-server";
import dotenv from "dotenv";
import { configFromEnv } from "../config";
import { RagPace } from "../RagPace";
import { createApp } from "./app";

dotenv.config();

const { port, ...config } = configFromEnv();
const rag = new RagPace(config);
const app = createApp(rag);

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`Server running on http://localhost:${info.port}`);
  console.log(`API docs: http://localhost:${info.port}/docs`);
});
