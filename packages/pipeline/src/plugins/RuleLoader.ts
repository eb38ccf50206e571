/**
 * @fileoverview Rule Loader
 *
 * Loads classification rules from:
 * - YAML files (rule definitions with a `when:` condition)
 * - Code files (JS exporting ClassificationRule objects)
 *
 * Files in a directory are read in file-name order, and rules keep their
 * order within a file, so a directory of `10-denied.yml`, `20-after-hours.js`
 * gives a predictable first-match order.
 *
 * @module @access-insights/pipeline/plugins/RuleLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import { compileExpression, parseRuleExpression } from "../classification/ruleExpression.js";
import type { Scalar } from "../contracts/CanonicalField.js";
import { isScalar } from "../contracts/CanonicalField.js";
import type { ClassificationRule } from "../contracts/ClassificationRule.js";
import { isClassificationRule } from "../contracts/ClassificationRule.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { consoleLogger, createScopedLogger, errorMessage } from "../contracts/PipelineLogger.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";

/**
 * Rule definition as written in YAML.
 *
 * @example
 * ```yaml
 * - id: denied
 *   label: access_denied
 *   description: Badge rejected at the reader
 *   metadata: { severity: high }
 *   when:
 *     outcome: DENY
 * ```
 */
export interface RuleDefinition {
    /** Unique rule id */
    id: string;

    /** Label given to matching rows */
    label: string;

    /** Human-readable description */
    description?: string;

    /** Metadata copied onto matching rows */
    metadata?: Record<string, Scalar>;

    /** Condition block, see ruleExpression */
    when: unknown;
}

/**
 * Rule loader configuration.
 */
export interface RuleLoaderConfig {
    /** Logger for rule loading */
    logger?: PipelineLogger;
}

/**
 * Type guard for a YAML rule definition.
 */
export function isRuleDefinition(obj: unknown): obj is RuleDefinition {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        obj.id.trim() !== "" &&
        "label" in obj &&
        typeof obj.label === "string" &&
        "when" in obj &&
        (!("description" in obj) || typeof obj.description === "string") &&
        (!("metadata" in obj) || isMetadata(obj.metadata))
    );
}

/**
 * Validate a parsed YAML list of rule definitions.
 *
 * @param raw - Parsed YAML value; a list of definitions
 * @param source - File or section name used in error messages
 * @throws ConfigurationError naming every invalid entry
 */
export function parseRuleDefinitions(raw: unknown, source: string): RuleDefinition[] {
    if (raw === null || raw === undefined) {
        return [];
    }
    if (!Array.isArray(raw)) {
        throw new ConfigurationError(`Invalid rules in ${source}`, ["Expected a list of rule definitions"]);
    }

    const definitions: RuleDefinition[] = [];
    const issues: string[] = [];

    raw.forEach((entry: unknown, index) => {
        if (isRuleDefinition(entry)) {
            definitions.push(entry);
        }
        else {
            issues.push(`Invalid rule at index ${index}: ${JSON.stringify(entry)}`);
        }
    });

    if (issues.length > 0) {
        throw new ConfigurationError(`Invalid rules in ${source}`, issues);
    }

    return definitions;
}

/**
 * Create a ClassificationRule from a YAML definition.
 *
 * @param def - Rule definition
 * @param schema - Schema the condition is compiled against
 * @throws ConfigurationError for a malformed condition or unknown field
 */
export function createRuleFromDefinition(def: RuleDefinition, schema: SchemaRegistry): ClassificationRule {
    const compiled = compileExpression(parseRuleExpression(def.when, `${def.id}.when`), schema);

    return {
        id         : def.id,
        label      : def.label,
        description: def.description,
        fields     : compiled.fields,
        metadata   : def.metadata,
        matches    : compiled.test,
    };
}

/**
 * Rule Loader
 *
 * @example
 * ```typescript
 * const loader = new RuleLoader(schema);
 *
 * const rules = await loader.loadFromDirectory("./user/rules");
 * const ruleSet = RuleSet.create(schema, [...builtInRules, ...rules]);
 * ```
 */
export class RuleLoader {
    private readonly logger: PipelineLogger;

    constructor(
        private readonly schema: SchemaRegistry,
        config: RuleLoaderConfig = {}
    ) {
        this.logger = createScopedLogger(config.logger ?? consoleLogger, "RuleLoader");
    }

    /**
     * Load all rules from a directory, in file-name order.
     *
     * Scans for:
     * - .yml/.yaml files → rule definitions
     * - .js/.mjs files → exported ClassificationRule objects
     *
     * Authoring errors in any file are collected and thrown together once
     * every file has been read. A file that cannot be read or imported is
     * logged and skipped.
     *
     * @param dirPath - Path to rules directory
     * @throws ConfigurationError naming every file with an invalid rule
     */
    async loadFromDirectory(dirPath: string): Promise<ClassificationRule[]> {
        const rules: ClassificationRule[] = [];

        if (!existsSync(dirPath)) {
            this.logger.warn("Rule directory does not exist", { dirPath });
            return rules;
        }

        const stat = statSync(dirPath);
        if (!stat.isDirectory()) {
            this.logger.warn("Rule path is not a directory", { dirPath });
            return rules;
        }

        const files = readdirSync(dirPath).sort();
        const issues: string[] = [];

        for (const file of files) {
            const filePath = join(dirPath, file);
            const ext = extname(file).toLowerCase();

            try {
                if (ext === ".yml" || ext === ".yaml") {
                    rules.push(...this.loadYamlFile(filePath));
                }
                else if (ext === ".js" || ext === ".mjs") {
                    rules.push(...(await this.loadCodeFile(filePath)));
                }
            }
            catch (error) {
                if (error instanceof ConfigurationError) {
                    issues.push(`${file}: ${error.message}`);
                }
                else {
                    this.logger.error("Failed to load rule file", {
                        filePath,
                        error: errorMessage(error),
                    });
                }
            }
        }

        if (issues.length > 0) {
            throw new ConfigurationError(`Invalid rule files in ${dirPath}`, issues);
        }

        this.logger.info("Rules loaded from directory", {
            dirPath,
            rules: rules.length,
        });

        return rules;
    }

    /**
     * Load rules from a YAML file: a list of definitions, or a mapping with
     * a `rules` list.
     *
     * @throws ConfigurationError for malformed YAML or an invalid definition
     */
    loadYamlFile(filePath: string): ClassificationRule[] {
        const content = readFileSync(filePath, "utf-8");

        let parsed: unknown;
        try {
            parsed = parseYaml(content);
        }
        catch (error) {
            throw new ConfigurationError(`Invalid YAML in ${filePath}`, [errorMessage(error)]);
        }

        const list = typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) && "rules" in parsed
            ? parsed.rules
            : parsed;

        const rules = parseRuleDefinitions(list, filePath).map((def) => createRuleFromDefinition(def, this.schema));
        for (const rule of rules) {
            this.logger.debug("Loaded YAML rule", { id: rule.id });
        }
        return rules;
    }

    /**
     * Load rules from a code file.
     *
     * Every export that is a ClassificationRule, or an array of them, is
     * taken, in export order.
     */
    async loadCodeFile(filePath: string): Promise<ClassificationRule[]> {
        const module: unknown = await import(pathToFileURL(filePath).href);
        const rules: ClassificationRule[] = [];
        const seen = new Set<ClassificationRule>();

        if (typeof module !== "object" || module === null) {
            return rules;
        }

        const take = (candidate: unknown, key: string): void => {
            if (isClassificationRule(candidate) && !seen.has(candidate)) {
                seen.add(candidate);
                rules.push(candidate);
                this.logger.debug("Loaded code rule", { id: candidate.id, export: key });
            }
        };

        for (const [key, exported] of Object.entries(module)) {
            if (Array.isArray(exported)) {
                for (const item of exported) {
                    take(item, key);
                }
            }
            else {
                take(exported, key);
            }
        }

        return rules;
    }

    /**
     * Load rules from several directories, in the order given.
     */
    async loadFromDirectories(dirPaths: readonly string[]): Promise<ClassificationRule[]> {
        const rules: ClassificationRule[] = [];

        for (const dirPath of dirPaths) {
            rules.push(...(await this.loadFromDirectory(dirPath)));
        }

        return rules;
    }
}

function isMetadata(value: unknown): value is Record<string, Scalar> {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        Object.values(value).every(isScalar)
    );
}
