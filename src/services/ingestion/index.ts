export {
  IngestionOrchestrator,
  generateRunId,
  validateCollectionName,
  skipStatusesFor,
  COLLECTION_NAME_PATTERN,
  CANCELLED_BEFORE_PROCESSING,
  CANCELLED_WHILE_PROCESSING,
} from './orchestrator.js';
export type { OrchestratorDeps, RunOptions } from './orchestrator.js';
export { processFile, FileRejectedError, FileCancelledError, NO_TEXT_REASON, NO_CHUNKS_REASON } from './pipeline.js';
export type { FileOutcome, PipelineContext, PipelineDeps } from './pipeline.js';
export { listInputFiles, describeFile, SUPPORTED_EXTENSIONS } from './discovery.js';
export type { DiscoveredFile } from './discovery.js';
export { IngestionError, describeError, pathNotFoundError, invalidCollectionError } from './errors.js';
export type { IngestionErrorCategory } from './errors.js';
