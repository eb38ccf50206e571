/**
 * @fileoverview Ingestion barrel exports
 *
 * @module @access-insights/pipeline/ingestion
 */

export {
    IngestionParser,
    type IngestionParserOptions,
} from "./IngestionParser.js";
export {
    readCsv,
    pickDelimiter,
    type CsvEncoding,
    type CsvReadOptions,
    type CsvSource,
} from "./csvReader.js";
export {
    coerceValue,
    parseTimestamp,
    TIMESTAMP_FORMAT,
    type CoercionResult,
} from "./coerce.js";
