/**
 * @fileoverview Value coercion
 *
 * Turns a trimmed, non-empty raw cell into the typed value of its canonical
 * field. Coercion never guesses: a value that does not fit the field's type
 * is a failure with a reason, never a fallback.
 *
 * @module @access-insights/pipeline/ingestion/coerce
 */

import type { CanonicalField, FieldValue } from "../contracts/CanonicalField.js";

/**
 * The one accepted timestamp layout. The date/time separator may be a
 * space or "T"; seconds are optional; the value is read as UTC.
 */
export const TIMESTAMP_FORMAT = "YYYY-MM-DD HH:MM[:SS]";

const kINTEGER_PATTERN   = /^[+-]?\d+$/;
const kTIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/;

export type CoercionResult =
    | { readonly ok: true; readonly value: FieldValue }
    | { readonly ok: false; readonly reason: string };

/**
 * Coerce a raw value to the field's type.
 *
 * @param field - Target canonical field
 * @param raw - Trimmed, non-empty raw value
 */
export function coerceValue(field: CanonicalField, raw: string): CoercionResult {
    switch (field.type) {
        case "string":
            return { ok: true, value: raw };

        case "integer": {
            if (!kINTEGER_PATTERN.test(raw)) {
                return { ok: false, reason: "Expected an integer" };
            }
            const parsed = Number(raw);
            if (!Number.isSafeInteger(parsed)) {
                return { ok: false, reason: "Integer out of range" };
            }
            return { ok: true, value: parsed };
        }

        case "timestamp": {
            const parsed = parseTimestamp(raw);
            if (!parsed) {
                return { ok: false, reason: `Expected a timestamp formatted ${TIMESTAMP_FORMAT}` };
            }
            return { ok: true, value: parsed };
        }

        case "enum": {
            const lower = raw.toLowerCase();
            const match = (field.values ?? []).find((candidate) => candidate.toLowerCase() === lower);
            if (match === undefined) {
                return { ok: false, reason: `Expected one of: ${(field.values ?? []).join(", ")}` };
            }
            return { ok: true, value: match };
        }
    }
}

/**
 * Parse a timestamp in {@link TIMESTAMP_FORMAT}.
 *
 * Every component is range-checked against the calendar, so "2024-02-30"
 * or "25:00" are rejected rather than rolled over.
 *
 * @returns The UTC date, or null if the value does not match
 */
export function parseTimestamp(raw: string): Date | null {
    const match = kTIMESTAMP_PATTERN.exec(raw);
    if (!match) {
        return null;
    }

    const [year, month, day, hour, minute, second] = match
        .slice(1)
        .map((part) => (part === undefined ? 0 : Number(part)));

    if (hour > 23 || minute > 59 || second > 59) {
        return null;
    }

    // setUTCFullYear keeps two-digit years literal, unlike Date.UTC
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);

    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day
    ) {
        return null;
    }

    return date;
}
