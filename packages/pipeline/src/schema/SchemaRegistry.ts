/**
 * @fileoverview Schema Registry
 *
 * Holds the canonical field definitions every upload is mapped onto.
 * Built once at configuration load, validated, frozen, and then shared
 * read-only by every batch.
 *
 * @module @access-insights/pipeline/schema/SchemaRegistry
 */

import type { CanonicalField, FieldType } from "../contracts/CanonicalField.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import { coerceValue } from "../ingestion/coerce.js";

const kFIELD_TYPES: readonly FieldType[] = ["string", "integer", "timestamp", "enum"];

/**
 * Schema Registry
 *
 * @example
 * ```typescript
 * const schema = new SchemaRegistry([
 *     { name: "timestamp", type: "timestamp", required: true, aliases: ["ts", "time"] },
 *     { name: "actor",     type: "string",    required: true, aliases: ["user", "badge"] },
 *     { name: "outcome",   type: "enum",      required: true, values: ["GRANT", "DENY"] },
 * ]);
 *
 * schema.requiredFields().map((field) => field.name);
 * // => ["timestamp", "actor", "outcome"]
 * ```
 */
export class SchemaRegistry {
    readonly fields: readonly CanonicalField[];

    private readonly byName: ReadonlyMap<string, CanonicalField>;

    /**
     * @param fields - Field definitions, in display order
     * @throws ConfigurationError listing every invalid definition
     */
    constructor(fields: readonly CanonicalField[]) {
        const issues = validateFields(fields);
        if (issues.length > 0) {
            throw new ConfigurationError("Invalid schema", issues);
        }

        this.fields = Object.freeze(fields.map(freezeField));
        this.byName = new Map(this.fields.map((field) => [field.name, field]));
    }

    get(name: string): CanonicalField | undefined {
        return this.byName.get(name);
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    requiredFields(): CanonicalField[] {
        return this.fields.filter((field) => field.required);
    }

    groupableFields(): CanonicalField[] {
        return this.fields.filter((field) => field.groupable === true);
    }

    /**
     * Alias table entries for a field, not including the field name itself.
     */
    aliasesFor(name: string): readonly string[] {
        return this.byName.get(name)?.aliases ?? [];
    }
}

function freezeField(field: CanonicalField): CanonicalField {
    return Object.freeze({
        ...field,
        ...(field.aliases && { aliases: Object.freeze([...field.aliases]) }),
        ...(field.values && { values: Object.freeze([...field.values]) }),
    });
}

function validateFields(fields: readonly CanonicalField[]): string[] {
    const issues: string[] = [];
    const seen = new Set<string>();

    if (fields.length === 0) {
        issues.push("Schema defines no fields");
    }

    fields.forEach((field, index) => {
        const where = field.name ? `'${field.name}'` : `at index ${index}`;

        if (!field.name || field.name.trim() !== field.name) {
            issues.push(`Field ${where} has an empty or padded name`);
        }
        else if (seen.has(field.name)) {
            issues.push(`Field '${field.name}' is defined more than once`);
        }
        seen.add(field.name);

        if (!kFIELD_TYPES.includes(field.type)) {
            issues.push(`Field ${where} has unknown type '${String(field.type)}'`);
            return;
        }

        if (field.type === "enum" && (!field.values || field.values.length === 0)) {
            issues.push(`Enum field ${where} declares no values`);
        }
        if (field.type !== "enum" && field.values) {
            issues.push(`Field ${where} declares values but is not an enum`);
        }

        if (field.default !== undefined) {
            const trimmed = field.default.trim();
            const result = trimmed === ""
                ? { ok: false as const, reason: "Default is empty" }
                : coerceValue(field, trimmed);
            if (!result.ok) {
                issues.push(`Field ${where} has an invalid default: ${result.reason}`);
            }
        }
    });

    return issues;
}
