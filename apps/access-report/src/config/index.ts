/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadPipelineConfig,
    type PipelineConfig,
} from "./loadPipelineConfig.js";
