/**
 * @fileoverview Access Insights pipeline
 *
 * Turns an uploaded access-event CSV into classified rows and aggregate
 * statistics.
 *
 * The pipeline provides:
 * - A fixed canonical schema every upload is mapped onto
 * - Column mapping suggestions and validation
 * - Row-level parsing with collected, never thrown, errors
 * - Ordered first-match classification rules
 * - Per-label, per-dimension counts and anomaly flags
 *
 * @module @access-insights/pipeline
 * @example
 * ```typescript
 * import {
 *     SchemaRegistry,
 *     RuleSet,
 *     RuleLoader,
 *     PipelineOrchestrator,
 * } from "@access-insights/pipeline";
 *
 * const schema = new SchemaRegistry(fields);
 * const rules = await new RuleLoader(schema).loadFromDirectory("./rules");
 * const orchestrator = new PipelineOrchestrator({ schema, ruleSet: RuleSet.create(schema, rules) });
 *
 * const result = orchestrator.run(bytes);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Stage exports
// ============================================================================

export * from "./schema/index.js";
export * from "./mapping/index.js";
export * from "./ingestion/index.js";
export * from "./classification/index.js";
export * from "./aggregation/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";
export * from "./plugins/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";
