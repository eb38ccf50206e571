/**
 * @fileoverview Engine barrel exports
 *
 * @module @access-insights/pipeline/engine
 */

export {
    PipelineOrchestrator,
    type OrchestratorConfig,
    type RunOptions,
} from "./PipelineOrchestrator.js";
