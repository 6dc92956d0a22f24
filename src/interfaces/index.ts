export * from "./chunker";
export * from "./database";
export * from "./embedding";
export * from "./ingestion";
export * from "./loader";
export * from "./logger";
export * from "./retrieval";
