/**
 * @fileoverview Access Report - Main Entry Point
 *
 * Runs badge-reader CSV exports through the access insights pipeline and
 * prints a report per file, then a combined summary when several files are
 * given.
 *
 * Environment (read from .env when present):
 * - ACCESS_REPORT_CONFIG: pipeline configuration (default ./config/pipeline.yml)
 * - ACCESS_REPORT_RULES_DIR: user rules directory (default ./user/rules)
 *
 * @module access-report
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { readFileSync } from "fs";
import { join, dirname, basename } from "path";
import { fileURLToPath } from "url";

import type { StatsSnapshot } from "@access-insights/pipeline";

import { parseArgs, USAGE } from "./cli/parseArgs.js";
import { createPipeline } from "./pipeline.js";
import { formatReport, formatSnapshot } from "./report/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    if (args.help || args.files.length === 0) {
        console.log(USAGE);
        process.exitCode = args.help ? 0 : 1;
        return;
    }

    const pipeline = await createPipeline({
        configPath: process.env.ACCESS_REPORT_CONFIG ?? join(__dirname, "..", "config", "pipeline.yml"),
        rulesDir  : process.env.ACCESS_REPORT_RULES_DIR ?? join(__dirname, "..", "user", "rules"),
    });
    const { orchestrator } = pipeline;

    orchestrator.eventBus.subscribe("batch:failed", (event) => {
        console.error(`[FAILED] ${event.batchId ?? ""}`);
    });

    let combined: StatsSnapshot | null = null;
    let failures = 0;

    for (const file of args.files) {
        const result = orchestrator.run(readFileSync(file), {
            batchId: basename(file),
            ...(args.mapping && { mapping: args.mapping }),
        });

        console.log("");
        console.log(formatReport(result, orchestrator.aggregator, { top: args.top }).join("\n"));

        if (result.status === "failed") {
            failures += 1;
            continue;
        }
        combined = combined ? orchestrator.aggregator.merge(combined, result.snapshot) : result.snapshot;
    }

    if (combined && args.files.length > 1) {
        console.log("");
        console.log("Combined");
        console.log(formatSnapshot(combined, orchestrator.aggregator, { top: args.top }).join("\n"));
    }

    if (failures > 0) {
        process.exitCode = 1;
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL]", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
