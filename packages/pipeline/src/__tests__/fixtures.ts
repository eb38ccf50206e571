/**
 * Shared test fixtures: a small access-event schema and helpers.
 */

import { vi } from "vitest";
import type { CanonicalField } from "../contracts/CanonicalField.js";
import type { CanonicalRow } from "../contracts/CanonicalRow.js";
import type { FieldValue } from "../contracts/CanonicalField.js";
import type { PipelineLogger } from "../contracts/PipelineLogger.js";
import { SchemaRegistry } from "../schema/SchemaRegistry.js";

export const accessFields: CanonicalField[] = [
    { name: "timestamp", label: "Event Time", type: "timestamp", required: true, groupable: true, aliases: ["ts", "time"] },
    { name: "location", label: "Door", type: "string", required: true, groupable: true, aliases: ["door", "door_id", "reader"] },
    { name: "actor", label: "Badge Holder", type: "string", required: true, groupable: true, aliases: ["user", "badge"] },
    { name: "outcome", label: "Access Result", type: "enum", required: true, groupable: true, values: ["GRANT", "DENY"], aliases: ["result", "status"] },
    { name: "floor", type: "integer", required: false },
    { name: "security_level", type: "enum", required: false, values: ["LOW", "HIGH"], default: "LOW" },
];

export function createAccessSchema(): SchemaRegistry {
    return new SchemaRegistry(accessFields);
}

export function createMockLogger(): PipelineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

export function encode(text: string): Uint8Array {
    return new TextEncoder().encode(text);
}

export function createRow(rowIndex: number, values: Record<string, FieldValue>): CanonicalRow {
    return { rowIndex, values };
}

/**
 * Canonical row for an access event at the given UTC time.
 */
export function accessRow(
    rowIndex: number,
    time: string,
    location: string,
    actor: string,
    outcome: "GRANT" | "DENY"
): CanonicalRow {
    return createRow(rowIndex, {
        timestamp: new Date(`${time}Z`),
        location,
        actor,
        outcome,
    });
}
