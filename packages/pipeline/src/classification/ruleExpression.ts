/**
 * @fileoverview Rule expressions
 *
 * A small condition language for rules written in configuration. Expressions
 * are parsed from the `when:` block of a rule definition and compiled against
 * the schema, so an unknown field or an operand of the wrong type is a
 * configuration error at load time instead of a silent mismatch per row.
 *
 * `when:` syntax:
 *
 * ```yaml
 * when:
 *   outcome: DENY                       # eq shorthand
 *   location: { in: [Server Room, Vault] }
 *   timestamp: { hour_between: [22, 6] }
 *   any:
 *     - actor: { matches: "^contractor-" }
 *     - not: { actor: { exists: true } }
 * ```
 *
 * Several keys in one block must all hold. `all`, `any` and `not` are
 * reserved keys and cannot be used as field names.
 *
 * A condition on a field the row has no value for is false, whatever the
 * operator; use `exists` to test presence.
 *
 * @module @access-insights/pipeline/classification/ruleExpression
 */

import type { CanonicalField, FieldValue } from "../contracts/CanonicalField.js";
import type { CanonicalRow } from "../contracts/CanonicalRow.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import { coerceValue } from "../ingestion/coerce.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";

export type Operand = string | number;

export type ComparisonOperator = "eq" | "neq" | "gt" | "gte" | "lt" | "lte";
export type MembershipOperator = "in" | "not_in";

export type RuleExpression =
    | { readonly op: ComparisonOperator; readonly field: string; readonly value: Operand }
    | { readonly op: MembershipOperator; readonly field: string; readonly values: readonly Operand[] }
    | { readonly op: "matches"; readonly field: string; readonly pattern: string }
    | { readonly op: "exists"; readonly field: string }
    | { readonly op: "hour_between"; readonly field: string; readonly from: number; readonly to: number }
    | { readonly op: "all"; readonly of: readonly RuleExpression[] }
    | { readonly op: "any"; readonly of: readonly RuleExpression[] }
    | { readonly op: "not"; readonly expr: RuleExpression };

export type RulePredicate = (row: CanonicalRow) => boolean;

/**
 * A compiled expression and the fields it reads.
 */
export interface CompiledExpression {
    readonly fields: readonly string[];
    readonly test: RulePredicate;
}

const kCOMPARISONS = ["eq", "neq", "gt", "gte", "lt", "lte"] as const;
const kMEMBERSHIP  = ["in", "not_in"] as const;
const kORDERING: readonly string[] = ["gt", "gte", "lt", "lte"];

/**
 * Parse a `when:` block into an expression tree.
 *
 * @param raw - Parsed YAML value
 * @param path - Location used in error messages
 * @throws ConfigurationError listing every malformed condition
 */
export function parseRuleExpression(raw: unknown, path = "when"): RuleExpression {
    const issues: string[] = [];
    const expr = parseBlock(raw, path, issues);
    if (issues.length > 0) {
        throw new ConfigurationError("Invalid rule condition", issues);
    }
    return expr;
}

/**
 * Compile an expression against the schema.
 *
 * Operands are coerced with the same rules as upload values, so
 * `{ outcome: deny }` matches rows stored as "DENY" and timestamps are
 * written the way uploads write them.
 *
 * @throws ConfigurationError listing every unknown field and bad operand
 */
export function compileExpression(expr: RuleExpression, schema: SchemaRegistry): CompiledExpression {
    const issues: string[] = [];
    const fields = new Set<string>();
    const test = compileNode(expr, schema, issues, fields);

    if (issues.length > 0) {
        throw new ConfigurationError("Invalid rule condition", issues);
    }

    return { fields: [...fields], test };
}

function parseBlock(raw: unknown, path: string, issues: string[]): RuleExpression {
    if (!isRecord(raw)) {
        issues.push(`${path}: expected a mapping of conditions`);
        return { op: "all", of: [] };
    }

    const entries = Object.entries(raw);
    if (entries.length === 0) {
        issues.push(`${path}: no conditions`);
    }

    const parts = entries.map(([key, value]) => parseEntry(key, value, `${path}.${key}`, issues));
    return parts.length === 1 ? parts[0] : { op: "all", of: parts };
}

function parseEntry(key: string, value: unknown, path: string, issues: string[]): RuleExpression {
    if (key === "all" || key === "any") {
        const of: RuleExpression[] = [];
        if (!Array.isArray(value) || value.length === 0) {
            issues.push(`${path}: expected a non-empty list of conditions`);
        }
        else {
            value.forEach((item: unknown, index) => of.push(parseBlock(item, `${path}[${index}]`, issues)));
        }
        return key === "all" ? { op: "all", of } : { op: "any", of };
    }

    if (key === "not") {
        return { op: "not", expr: parseBlock(value, path, issues) };
    }

    if (!isRecord(value)) {
        if (isOperand(value)) {
            return { op: "eq", field: key, value };
        }
        issues.push(`${path}: expected a value or an operator mapping`);
        return { op: "exists", field: key };
    }

    const operators = Object.entries(value);
    if (operators.length !== 1) {
        issues.push(`${path}: expected exactly one operator, got ${operators.length}`);
        return { op: "exists", field: key };
    }

    const [op, operand] = operators[0];
    return parseCondition(key, op, operand, `${path}.${op}`, issues);
}

function parseCondition(field: string, op: string, operand: unknown, path: string, issues: string[]): RuleExpression {
    const comparison = kCOMPARISONS.find((candidate) => candidate === op);
    if (comparison) {
        if (!isOperand(operand)) {
            issues.push(`${path}: expected a string or number`);
            return { op: "exists", field };
        }
        return { op: comparison, field, value: operand };
    }

    const membership = kMEMBERSHIP.find((candidate) => candidate === op);
    if (membership) {
        if (!Array.isArray(operand) || operand.length === 0 || !operand.every(isOperand)) {
            issues.push(`${path}: expected a non-empty list of strings or numbers`);
            return { op: "exists", field };
        }
        return { op: membership, field, values: operand };
    }

    switch (op) {
        case "matches":
            if (typeof operand !== "string") {
                issues.push(`${path}: expected a regular expression string`);
                return { op: "exists", field };
            }
            return { op: "matches", field, pattern: operand };

        case "exists":
            if (typeof operand !== "boolean") {
                issues.push(`${path}: expected true or false`);
                return { op: "exists", field };
            }
            return operand ? { op: "exists", field } : { op: "not", expr: { op: "exists", field } };

        case "hour_between": {
            if (!Array.isArray(operand) || operand.length !== 2) {
                issues.push(`${path}: expected [from, to]`);
                return { op: "exists", field };
            }
            const [from, to] = operand;
            if (!isHour(from) || !isHour(to) || from === to) {
                issues.push(`${path}: expected two different hours between 0 and 23`);
                return { op: "exists", field };
            }
            return { op: "hour_between", field, from, to };
        }

        default:
            issues.push(`${path}: unknown operator '${op}'`);
            return { op: "exists", field };
    }
}

function compileNode(
    expr: RuleExpression,
    schema: SchemaRegistry,
    issues: string[],
    fields: Set<string>
): RulePredicate {
    switch (expr.op) {
        case "all": {
            const parts = expr.of.map((child) => compileNode(child, schema, issues, fields));
            return (row) => parts.every((part) => part(row));
        }
        case "any": {
            const parts = expr.of.map((child) => compileNode(child, schema, issues, fields));
            return (row) => parts.some((part) => part(row));
        }
        case "not": {
            const inner = compileNode(expr.expr, schema, issues, fields);
            return (row) => !inner(row);
        }
        default:
            return compileCondition(expr, schema, issues, fields);
    }
}

type Condition = Exclude<RuleExpression, { readonly op: "all" | "any" | "not" }>;

function compileCondition(
    expr: Condition,
    schema: SchemaRegistry,
    issues: string[],
    fields: Set<string>
): RulePredicate {
    const field = schema.get(expr.field);
    if (!field) {
        issues.push(`Unknown field '${expr.field}'`);
        return () => false;
    }
    fields.add(field.name);
    const name = field.name;

    switch (expr.op) {
        case "exists":
            return (row) => row.values[name] !== undefined;

        case "matches": {
            if (field.type !== "string" && field.type !== "enum") {
                issues.push(`'matches' needs a string or enum field, '${name}' is ${field.type}`);
                return () => false;
            }
            let pattern: RegExp;
            try {
                pattern = new RegExp(expr.pattern);
            }
            catch (error) {
                issues.push(`Invalid pattern for '${name}': ${error instanceof Error ? error.message : String(error)}`);
                return () => false;
            }
            return (row) => {
                const value = row.values[name];
                return typeof value === "string" && pattern.test(value);
            };
        }

        case "hour_between": {
            if (field.type !== "timestamp") {
                issues.push(`'hour_between' needs a timestamp field, '${name}' is ${field.type}`);
                return () => false;
            }
            const { from, to } = expr;
            return (row) => {
                const value = row.values[name];
                if (!(value instanceof Date)) {
                    return false;
                }
                const hour = value.getUTCHours();
                // [from, to), wrapping past midnight when from > to
                return from < to ? hour >= from && hour < to : hour >= from || hour < to;
            };
        }

        case "in":
        case "not_in": {
            const values = expr.values.map((operand) => operandFor(field, operand, issues));
            const set = new Set(values);
            const negate = expr.op === "not_in";
            return (row) => {
                const value = row.values[name];
                return value !== undefined && set.has(comparable(value)) !== negate;
            };
        }

        default: {
            if (kORDERING.includes(expr.op) && field.type !== "integer" && field.type !== "timestamp") {
                issues.push(`'${expr.op}' needs an integer or timestamp field, '${name}' is ${field.type}`);
                return () => false;
            }
            const target = operandFor(field, expr.value, issues);
            const compare = comparator(expr.op);
            return (row) => {
                const value = row.values[name];
                return value !== undefined && compare(comparable(value), target);
            };
        }
    }
}

function comparator(op: ComparisonOperator): (left: string | number, right: string | number) => boolean {
    switch (op) {
        case "eq" : return (left, right) => left === right;
        case "neq": return (left, right) => left !== right;
        case "gt" : return (left, right) => left > right;
        case "gte": return (left, right) => left >= right;
        case "lt" : return (left, right) => left < right;
        case "lte": return (left, right) => left <= right;
    }
}

/**
 * Coerce a configured operand the way an upload cell would be.
 */
function operandFor(field: CanonicalField, operand: Operand, issues: string[]): string | number {
    const text = String(operand).trim();
    const result = text === ""
        ? { ok: false as const, reason: "Value is empty" }
        : coerceValue(field, text);

    if (!result.ok) {
        issues.push(`Invalid value '${text}' for '${field.name}': ${result.reason}`);
        return text;
    }
    return comparable(result.value);
}

function comparable(value: FieldValue): string | number {
    return value instanceof Date ? value.getTime() : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOperand(value: unknown): value is Operand {
    return typeof value === "string" || typeof value === "number";
}

function isHour(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 23;
}
