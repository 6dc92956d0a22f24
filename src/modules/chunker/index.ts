export { Chunker, DEFAULT_CHUNKER_CONFIG } from "./chunker";
export {
  FixedSizeStrategy,
  RecursiveStrategy,
  estimateTokens,
  createSpan,
} from "./strategies";
