/**
 * @fileoverview Rule Set
 *
 * The ordered, validated collection of classification rules. Registration is
 * where authoring errors surface: once a RuleSet exists it is frozen and
 * shared read-only by every batch.
 *
 * @module @access-insights/pipeline/classification/RuleSet
 */

import type { ClassificationRule } from "../contracts/ClassificationRule.js";
import { UNCLASSIFIED_LABEL } from "../contracts/ClassificationRule.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { consoleLogger } from "../contracts/PipelineLogger.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";

/**
 * Rule set options.
 */
export interface RuleSetOptions {
    /** Logger for registration */
    readonly logger?: PipelineLogger;
}

/**
 * Rule Set
 *
 * @example
 * ```typescript
 * const rules = RuleSet.create(schema, [deniedRule, afterHoursRule]);
 *
 * rules.labels;
 * // => ["access_denied", "after_hours", "unclassified"]
 * ```
 */
export class RuleSet {
    /**
     * Every label a classified row can carry: rule labels in declared order,
     * then `unclassified`.
     */
    readonly labels: readonly string[];

    private constructor(readonly rules: readonly ClassificationRule[]) {
        const labels = new Set(rules.map((rule) => rule.label));
        labels.add(UNCLASSIFIED_LABEL);
        this.labels = Object.freeze([...labels]);
    }

    /**
     * Validate and register rules, keeping their order.
     *
     * @param schema - Schema the rules read
     * @param rules - Rules in evaluation order; the first match wins
     * @throws ConfigurationError listing every invalid rule
     */
    static create(
        schema: SchemaRegistry,
        rules: readonly ClassificationRule[],
        options: RuleSetOptions = {}
    ): RuleSet {
        const issues = validateRules(schema, rules);
        if (issues.length > 0) {
            throw new ConfigurationError("Invalid rule set", issues);
        }

        const ruleSet = new RuleSet(Object.freeze(rules.map(freezeRule)));

        (options.logger ?? consoleLogger).info("Rule set registered", {
            rules : ruleSet.rules.length,
            labels: ruleSet.labels.length,
        });

        return ruleSet;
    }

    get size(): number {
        return this.rules.length;
    }
}

function freezeRule(rule: ClassificationRule): ClassificationRule {
    return Object.freeze({
        id         : rule.id,
        label      : rule.label,
        fields     : Object.freeze([...rule.fields]),
        metadata   : Object.freeze({ ...rule.metadata }),
        matches    : rule.matches.bind(rule),
        ...(rule.description !== undefined && { description: rule.description }),
    });
}

function validateRules(schema: SchemaRegistry, rules: readonly ClassificationRule[]): string[] {
    const issues: string[] = [];
    const seen = new Set<string>();

    rules.forEach((rule, index) => {
        const where = rule.id ? `'${rule.id}'` : `at index ${index}`;

        if (!rule.id || !rule.id.trim()) {
            issues.push(`Rule at index ${index} has no id`);
        }
        else if (seen.has(rule.id)) {
            issues.push(`Rule id '${rule.id}' is used more than once`);
        }
        seen.add(rule.id);

        if (!rule.label || !rule.label.trim()) {
            issues.push(`Rule ${where} has an empty label`);
        }
        else if (rule.label === UNCLASSIFIED_LABEL) {
            issues.push(`Rule ${where} uses the reserved label '${UNCLASSIFIED_LABEL}'`);
        }

        for (const field of rule.fields) {
            if (!schema.has(field)) {
                issues.push(`Rule ${where} reads unknown field '${field}'`);
            }
        }
    });

    return issues;
}
