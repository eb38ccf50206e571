/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow for the pipeline. The orchestrator announces every
 * batch state change so a host can observe progress without the pipeline
 * knowing who is listening.
 *
 * Design decisions:
 * - Synchronous dispatch (batches run synchronously)
 * - In-memory implementation, no external queue
 * - Ordering is preserved within a single event type
 *
 * @module @access-insights/pipeline/contracts/EventBus
 */

import type { BatchState } from "./BatchResult.js";

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Batch the event belongs to */
    readonly batchId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Batch lifecycle event types, one per batch state.
 */
export type BatchEventType = `batch:${BatchState}`;

/**
 * All known event types.
 */
export type EventType = BatchEventType | string;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("batch:parsed", (event) => {
 *     console.log("Parsed:", event.data);
 * });
 *
 * bus.emit(createEvent("batch:parsed", { rows: 120, errors: 5 }, "batch-1"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" / undefined for all)
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param batchId - Optional batch id
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    batchId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        batchId,
        data,
    };
}
