/**
 * @fileoverview Pipeline Configuration Loader
 *
 * Loads the canonical schema, classification rules, aggregation dimensions
 * and anomaly rules from a YAML configuration file.
 *
 * Only the shape of each entry is checked here. Semantic checks (duplicate
 * names, unknown fields, enum values) belong to the pipeline components the
 * entries are handed to.
 *
 * @module config/loadPipelineConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    ConfigurationError,
    parseRuleDefinitions,
    type AnomalyRule,
    type BucketKind,
    type CanonicalField,
    type CsvEncoding,
    type CsvReadOptions,
    type Dimension,
    type FieldType,
    type RuleDefinition,
} from "@access-insights/pipeline";

/**
 * Contents of a pipeline configuration file.
 */
export interface PipelineConfig {
    fields: CanonicalField[];
    rules: RuleDefinition[];

    /** Undefined when the file lists none; the aggregator then uses groupable fields */
    dimensions?: Dimension[];

    anomalies: AnomalyRule[];
    csv: CsvReadOptions;

    /** Lowest score a suggested mapping pair may have */
    minMappingScore?: number;
}

type RawEntry = Record<string, unknown>;

const kFIELD_TYPES = ["string", "integer", "timestamp", "enum"] as const satisfies readonly FieldType[];
const kBUCKET_KINDS = ["value", "hour", "weekday", "date"] as const satisfies readonly BucketKind[];
const kENCODINGS = ["utf-8", "latin1"] as const satisfies readonly CsvEncoding[];

/**
 * Load a pipeline configuration file.
 *
 * @param filePath - Path to the pipeline.yml file
 * @throws ConfigurationError if the file is missing or any entry is invalid
 *
 * @example
 * ```typescript
 * const config = loadPipelineConfig("./config/pipeline.yml");
 * config.fields.map((field) => field.name);
 * // ["timestamp", "location", "actor", "outcome", ...]
 * ```
 */
export function loadPipelineConfig(filePath: string): PipelineConfig {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`Pipeline configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed) || !Array.isArray(parsed.schema)) {
        throw new ConfigurationError(`Invalid pipeline configuration in ${filePath}`, [
            "Expected { schema: [...], rules: [...] }",
        ]);
    }

    const issues: string[] = [];

    const fields = parsed.schema.flatMap((raw: unknown, index: number) => {
        const field = toField(raw, index, issues);
        return field ? [field] : [];
    });

    const dimensions = parsed.dimensions === undefined
        ? undefined
        : listOf(parsed.dimensions, "dimensions", issues).flatMap((raw, index) => {
            const dimension = toDimension(raw, index, issues);
            return dimension ? [dimension] : [];
        });

    const anomalies = listOf(parsed.anomalies ?? [], "anomalies", issues).flatMap((raw, index) => {
        const rule = toAnomalyRule(raw, index, issues);
        return rule ? [rule] : [];
    });

    const csv = toCsvOptions(parsed.csv, issues);

    const minMappingScore = parsed.minMappingScore;
    if (minMappingScore !== undefined && (typeof minMappingScore !== "number" || minMappingScore < 0 || minMappingScore > 1)) {
        issues.push("Invalid 'minMappingScore': expected a number between 0 and 1");
    }

    if (issues.length > 0) {
        throw new ConfigurationError(`Invalid pipeline configuration in ${filePath}`, issues);
    }

    return {
        fields,
        rules: parseRuleDefinitions(parsed.rules, filePath),
        ...(dimensions && { dimensions }),
        anomalies,
        csv,
        ...(typeof minMappingScore === "number" && { minMappingScore }),
    };
}

function toField(raw: unknown, index: number, issues: string[]): CanonicalField | null {
    if (!isRecord(raw)) {
        issues.push(`Invalid field at index ${index}: expected a mapping`);
        return null;
    }

    if (typeof raw.name !== "string" || !raw.name) {
        issues.push(`Invalid field at index ${index}: missing or invalid 'name'`);
        return null;
    }

    const type = kFIELD_TYPES.find((candidate) => candidate === raw.type);
    if (!type) {
        issues.push(`Invalid field at index ${index}: 'type' must be one of ${kFIELD_TYPES.join(", ")}`);
        return null;
    }

    if (raw.required !== undefined && typeof raw.required !== "boolean") {
        issues.push(`Invalid field at index ${index}: 'required' must be true or false`);
    }
    if (raw.groupable !== undefined && typeof raw.groupable !== "boolean") {
        issues.push(`Invalid field at index ${index}: 'groupable' must be true or false`);
    }
    if (raw.label !== undefined && typeof raw.label !== "string") {
        issues.push(`Invalid field at index ${index}: 'label' must be a string`);
    }
    if (raw.aliases !== undefined && !isStringList(raw.aliases)) {
        issues.push(`Invalid field at index ${index}: 'aliases' must be a list of strings`);
    }
    if (raw.values !== undefined && !isScalarList(raw.values)) {
        issues.push(`Invalid field at index ${index}: 'values' must be a list of strings`);
    }
    if (raw.default !== undefined && typeof raw.default !== "string" && typeof raw.default !== "number") {
        issues.push(`Invalid field at index ${index}: 'default' must be a string or number`);
    }

    const field: CanonicalField = {
        name    : raw.name,
        type,
        required: raw.required === true,
        ...(typeof raw.label === "string" && { label: raw.label }),
        ...(isStringList(raw.aliases) && { aliases: raw.aliases }),
        // YAML reads unquoted numbers as numbers; enum values are text
        ...(isScalarList(raw.values) && { values: raw.values.map(String) }),
        ...((typeof raw.default === "string" || typeof raw.default === "number") && { default: String(raw.default) }),
        ...(raw.groupable === true && { groupable: true }),
    };

    return field;
}

function toDimension(raw: unknown, index: number, issues: string[]): Dimension | null {
    if (!isRecord(raw) || typeof raw.field !== "string" || !raw.field) {
        issues.push(`Invalid dimension at index ${index}: missing or invalid 'field'`);
        return null;
    }
    if (raw.name !== undefined && typeof raw.name !== "string") {
        issues.push(`Invalid dimension at index ${index}: 'name' must be a string`);
        return null;
    }

    const bucket = raw.bucket === undefined
        ? undefined
        : kBUCKET_KINDS.find((candidate) => candidate === raw.bucket);
    if (raw.bucket !== undefined && !bucket) {
        issues.push(`Invalid dimension at index ${index}: 'bucket' must be one of ${kBUCKET_KINDS.join(", ")}`);
        return null;
    }

    return {
        field: raw.field,
        ...(typeof raw.name === "string" && { name: raw.name }),
        ...(bucket && { bucket }),
    };
}

function toAnomalyRule(raw: unknown, index: number, issues: string[]): AnomalyRule | null {
    if (
        !isRecord(raw) ||
        typeof raw.id !== "string" ||
        typeof raw.label !== "string" ||
        typeof raw.dimension !== "string" ||
        typeof raw.threshold !== "number"
    ) {
        issues.push(`Invalid anomaly rule at index ${index}: expected id, label, dimension and threshold`);
        return null;
    }

    return {
        id       : raw.id,
        label    : raw.label,
        dimension: raw.dimension,
        threshold: raw.threshold,
        ...(typeof raw.description === "string" && { description: raw.description }),
    };
}

function toCsvOptions(raw: unknown, issues: string[]): CsvReadOptions {
    if (raw === undefined || raw === null) {
        return {};
    }
    if (!isRecord(raw)) {
        issues.push("Invalid 'csv': expected a mapping");
        return {};
    }

    const encoding = raw.encoding === undefined
        ? undefined
        : kENCODINGS.find((candidate) => candidate === raw.encoding);
    if (raw.encoding !== undefined && !encoding) {
        issues.push(`Invalid 'csv.encoding': must be one of ${kENCODINGS.join(", ")}`);
    }

    if (raw.delimiter !== undefined && (typeof raw.delimiter !== "string" || raw.delimiter.length !== 1)) {
        issues.push("Invalid 'csv.delimiter': expected a single character");
    }

    return {
        ...(encoding && { encoding }),
        ...(typeof raw.delimiter === "string" && raw.delimiter.length === 1 && { delimiter: raw.delimiter }),
    };
}

function listOf(raw: unknown, name: string, issues: string[]): unknown[] {
    if (!Array.isArray(raw)) {
        issues.push(`Invalid '${name}': expected a list`);
        return [];
    }
    return raw;
}

function isRecord(value: unknown): value is RawEntry {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isScalarList(value: unknown): value is (string | number)[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string" || typeof item === "number");
}
