export { EmbeddingError, validateEmbeddings } from './embedder.js';
export type { Embedder, EmbedOptions, EmbeddingErrorCode } from './embedder.js';
export { SentenceTransformerEmbedder, DEFAULT_BATCH_SIZE } from './sentence-transformers.js';
export type { SentenceTransformerOptions } from './sentence-transformers.js';
