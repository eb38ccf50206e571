/**
 * @fileoverview Contract barrel exports
 *
 * Data shapes and interfaces shared by every pipeline stage.
 *
 * @module @access-insights/pipeline/contracts
 */

// Canonical schema
export type {
    CanonicalField,
    FieldType,
    FieldValue,
    Scalar,
} from "./CanonicalField.js";
export { isScalar } from "./CanonicalField.js";

// Column mapping
export type {
    ColumnMapping,
    MappingConfidence,
    MappingIssue,
    MappingIssueKind,
    MappingSuggestion,
} from "./ColumnMapping.js";
export { isFatalMappingIssue } from "./ColumnMapping.js";

// Rows
export type {
    RawRow,
    CanonicalRow,
    ParseError,
    ParseResult,
    RowOutcome,
} from "./CanonicalRow.js";

// Classification rules
export type {
    ClassificationRule,
    ClassifiedRow,
} from "./ClassificationRule.js";
export {
    UNCLASSIFIED_LABEL,
    isClassificationRule,
} from "./ClassificationRule.js";

// Statistics
export type {
    AnomalyFlag,
    AnomalyRule,
    BucketKind,
    Dimension,
    Distribution,
    StatsSnapshot,
} from "./StatsSnapshot.js";
export { MISSING_BUCKET } from "./StatsSnapshot.js";

// Batch result
export type {
    BatchResult,
    BatchState,
    BatchSummary,
    CompletedBatch,
    FailedBatch,
} from "./BatchResult.js";

// Errors
export {
    ConfigurationError,
    type ConfigurationIssue,
} from "./ConfigurationError.js";

// Logging
export type { PipelineLogger } from "./PipelineLogger.js";
export {
    consoleLogger,
    createScopedLogger,
    errorMessage,
} from "./PipelineLogger.js";

// EventBus contract
export type {
    BatchEventType,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
