/**
 * @fileoverview Classifier
 *
 * Gives every canonical row exactly one label. Rules run in declared order
 * and the first whose predicate holds supplies the label and metadata; a row
 * no rule matches is `unclassified`.
 *
 * Unlike parsing, classification cannot fail a row: a predicate that throws
 * is logged and counted as no match.
 *
 * @module @access-insights/pipeline/classification/Classifier
 */

import type { CanonicalRow } from "../contracts/CanonicalRow.js";
import type { ClassifiedRow } from "../contracts/ClassificationRule.js";
import { UNCLASSIFIED_LABEL } from "../contracts/ClassificationRule.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { consoleLogger, errorMessage } from "../contracts/PipelineLogger.js";
import type { RuleSet } from "./RuleSet.js";

export interface ClassifierOptions {
    readonly logger?: PipelineLogger;
}

const kNO_METADATA = Object.freeze({});

export class Classifier {
    private readonly logger: PipelineLogger;

    constructor(
        private readonly ruleSet: RuleSet,
        options: ClassifierOptions = {}
    ) {
        this.logger = options.logger ?? consoleLogger;
    }

    /**
     * Classify rows, one output per input, in input order.
     */
    classify(rows: readonly CanonicalRow[]): readonly ClassifiedRow[] {
        return Object.freeze(rows.map((row) => this.classifyRow(row)));
    }

    classifyRow(row: CanonicalRow): ClassifiedRow {
        for (const rule of this.ruleSet.rules) {
            let matched = false;
            try {
                matched = rule.matches(row);
            }
            catch (error) {
                this.logger.warn("Rule predicate failed", {
                    ruleId  : rule.id,
                    rowIndex: row.rowIndex,
                    error   : errorMessage(error),
                });
            }

            if (matched) {
                return Object.freeze({
                    rowIndex: row.rowIndex,
                    values  : row.values,
                    label   : rule.label,
                    ruleId  : rule.id,
                    metadata: rule.metadata ?? kNO_METADATA,
                });
            }
        }

        return Object.freeze({
            rowIndex: row.rowIndex,
            values  : row.values,
            label   : UNCLASSIFIED_LABEL,
            ruleId  : null,
            metadata: kNO_METADATA,
        });
    }
}
