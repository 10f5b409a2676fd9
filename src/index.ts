/**
 * vetdoc-pipeline: veterinary report processing
 *
 * @packageDocumentation
 */

// Main class and factory
export { VetDocPipeline, type VetDocDependencies } from './vetdoc.js';
export { createVetDocPipeline, type VetDocFactoryOptions } from './vetdoc.factory.js';

// Engines
export { PipelineEngine, type PipelineDependencies } from './engines/pipeline.engine.js';
export { planChunks, describeRange } from './engines/ocr/chunk.planner.js';
export { OcrRunner, type OcrRunContext } from './engines/ocr/ocr.runner.js';
export { toAbsolutePages, reassemblePages } from './engines/ocr/page.reassembler.js';
export { ImageExtractor, type ImageExtractionContext } from './engines/images/image.extractor.js';
export {
    filterImages,
    imageSignature,
    repetitionThreshold,
    geometryDropReason,
    type ImageFilterConfig,
} from './engines/images/image.filter.js';
export { parseReportFields, emptyReportInfo } from './engines/report/field.parser.js';
export { FIELD_RULES } from './engines/report/field-rules.js';

// Services
export {
    PDFProcessor,
    GeminiOcrAdapter,
    LocalImageStore,
    MemoryImageStore,
    type OcrModel,
    type GeminiOcrOptions,
} from './services/index.js';

// Configuration
export { resolveConfig, applyProcessingOptions } from './config/resolve.js';

export type {
    VetDocConfig,
    ResolvedConfig,
    OcrConfig,
    ImageConfig,
    DocumentConfig,
    StorageConfig,
    RateLimitConfig,
    LogConfig,
} from './types/config.types.js';

export {
    DEFAULT_OCR_CONFIG,
    DEFAULT_IMAGE_CONFIG,
    DEFAULT_DOCUMENT_CONFIG,
    DEFAULT_STORAGE_CONFIG,
    DEFAULT_RATE_LIMIT_CONFIG,
    DEFAULT_LOG_CONFIG,
} from './types/config.types.js';

export type {
    SourceDocument,
    PageRange,
    ChunkPlan,
    IPDFProcessor,
    PDFLoadResult,
} from './types/document.types.js';

export type {
    PageText,
    OcrChunkRequest,
    OcrChunkResult,
    AbsoluteChunkPages,
    IOcrAdapter,
    ReassembledText,
} from './types/ocr.types.js';

export type {
    RawImageCandidate,
    ImageSignature,
    FilteredImage,
    DroppedImage,
    ImageDropReason,
    ImageFilterResult,
    ExtractedImage,
    ImageStoreKey,
    IImageStore,
} from './types/image.types.js';

export type {
    ReportInfo,
    FieldRule,
    FieldRuleTable,
    LabelForm,
    ValueLayout,
    CaptureNormalization,
} from './types/report.types.js';

export type {
    ProcessInput,
    ProcessingOptions,
    ProcessingResult,
    ChunkProgress,
    StateTransition,
} from './types/result.types.js';

// Enums
export {
    ReportFieldEnum,
    REPORT_FIELDS,
    PipelineStateEnum,
    ChunkStatusEnum,
    PageNumberingEnum,
    ImageFormatEnum,
    StorageFailurePolicyEnum,
} from './types/enums.js';

export type {
    ReportField,
    PipelineState,
    ChunkStatus,
    PageNumbering,
    ImageFormat,
    StorageFailurePolicy,
} from './types/enums.js';

// Errors
export {
    ProcessingError,
    ConfigurationError,
    InvalidDocumentError,
    OCRTransientError,
    OCRFatalError,
    ReassemblyError,
    ImageDecodeError,
    StorageWriteError,
    RateLimitError,
    UnexpectedError,
    isProcessingError,
    wrapError,
    annotateOperation,
    generateCorrelationId,
    getCorrelationId,
    withCorrelationId,
} from './errors/index.js';

// Utilities
export {
    createLogger,
    withLogContext,
    RateLimiter,
    VetDocEventEmitter,
    createEventEmitter,
    sanitizeFilename,
    hashBuffer,
    systemClock,
} from './utils/index.js';

export type { Logger, LogMeta, VetDocEvents, Clock } from './utils/index.js';
