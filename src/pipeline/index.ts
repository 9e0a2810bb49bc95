/**
 * Pipeline module - format detection and per-record processing
 */

export { RecordPipeline } from './RecordPipeline';
export type {
    BatchResult,
    ContactTransport,
    FailureStage,
    QsoFailure,
    RecordPipelineOptions,
    RecordResult,
} from './RecordPipeline';
export { detectFormat, splitAdifRecords } from './formatDetector';
