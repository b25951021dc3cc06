export { type DispatcherOptions, ExtractionDispatcher, type ExtractionHandler } from './dispatcher';
export { createExtractionJob, describeFailure, type ExtractionJobDependencies } from './job';
export {
  DEFAULT_ENTRY_NAME,
  EntryIngestionService,
  type IngestEntryInput,
  type IngestEntryResult,
  QUEUE_FULL_DETAIL,
  type SemanticSearchResult,
  SHUTDOWN_DETAIL
} from './service';
