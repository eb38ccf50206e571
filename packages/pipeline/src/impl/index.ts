/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of pipeline contracts.
 *
 * @module @access-insights/pipeline/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
