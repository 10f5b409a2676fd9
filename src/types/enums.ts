/**
 * Report field enumeration
 * Fixed set of structured values extracted from report text
 */
export const ReportFieldEnum = {
    PATIENT_NAME: 'patient_name',
    SPECIES: 'species',
    BREED: 'breed',
    SEX: 'sex',
    AGE: 'age',
    OWNER_NAME: 'owner_name',
    VETERINARIAN: 'veterinarian',
    DATE: 'date',
    DIAGNOSIS: 'diagnosis',
    RECOMMENDATIONS: 'recommendations',
} as const;

export type ReportField = (typeof ReportFieldEnum)[keyof typeof ReportFieldEnum];

/**
 * All report fields in declaration order
 */
export const REPORT_FIELDS: readonly ReportField[] = Object.values(ReportFieldEnum);

/**
 * Pipeline state enumeration
 * Linear progression; FAILED is terminal and reachable from any state
 */
export const PipelineStateEnum = {
    VALIDATED: 'VALIDATED',
    CHUNKED: 'CHUNKED',
    OCRED: 'OCRED',
    REASSEMBLED: 'REASSEMBLED',
    IMAGES_EXTRACTED: 'IMAGES_EXTRACTED',
    PARSED: 'PARSED',
    COMPLETE: 'COMPLETE',
    FAILED: 'FAILED',
} as const;

export type PipelineState = (typeof PipelineStateEnum)[keyof typeof PipelineStateEnum];

/**
 * Chunk OCR status enumeration
 */
export const ChunkStatusEnum = {
    PENDING: 'PENDING',
    PROCESSING: 'PROCESSING',
    RETRYING: 'RETRYING',
    COMPLETED: 'COMPLETED',
    FAILED: 'FAILED',
} as const;

export type ChunkStatus = (typeof ChunkStatusEnum)[keyof typeof ChunkStatusEnum];

/**
 * Page numbering reported by an OCR adapter
 */
export const PageNumberingEnum = {
    CHUNK_LOCAL: 'chunk-local',
    ABSOLUTE: 'absolute',
} as const;

export type PageNumbering = (typeof PageNumberingEnum)[keyof typeof PageNumberingEnum];

/**
 * Image encodings understood by the extractor
 */
export const ImageFormatEnum = {
    JPEG: 'jpeg',
    JPEG2000: 'jp2',
    PNG: 'png',
} as const;

export type ImageFormat = (typeof ImageFormatEnum)[keyof typeof ImageFormatEnum];

/**
 * What to do when the image store rejects a write
 */
export const StorageFailurePolicyEnum = {
    SKIP: 'skip',
    FAIL: 'fail',
} as const;

export type StorageFailurePolicy = (typeof StorageFailurePolicyEnum)[keyof typeof StorageFailurePolicyEnum];
