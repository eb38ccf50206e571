/**
 * @fileoverview Rule loader barrel exports
 *
 * @module @access-insights/pipeline/plugins
 */

export {
    RuleLoader,
    createRuleFromDefinition,
    isRuleDefinition,
    parseRuleDefinitions,
    type RuleDefinition,
    type RuleLoaderConfig,
} from "./RuleLoader.js";
