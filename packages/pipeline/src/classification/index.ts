/**
 * @fileoverview Classification barrel exports
 *
 * @module @access-insights/pipeline/classification
 */

export { Classifier, type ClassifierOptions } from "./Classifier.js";
export { RuleSet, type RuleSetOptions } from "./RuleSet.js";
export {
    compileExpression,
    parseRuleExpression,
    type CompiledExpression,
    type ComparisonOperator,
    type MembershipOperator,
    type Operand,
    type RuleExpression,
    type RulePredicate,
} from "./ruleExpression.js";
