export { createIngestionPipeline } from './ingest.js';
export type {
    IngestionPipeline,
    IngestionPipelineOptions,
    IngestOptions,
    IngestionResult,
    IngestionStats,
} from './ingest.js';
