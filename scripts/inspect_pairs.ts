/**
 * Load the A/B comparison sources and report what a session would see.
 *
 * Usage: npx tsx scripts/inspect_pairs.ts [--prompts path] [--comparisons path]
 *        [--progress path] [--out path]
 *
 * Flags:
 *   --out   Write the merged progress CSV to this path
 *
 * Paths default to PROMPTS_PATH, COMPARISONS_PATH and PROGRESS_PATH.
 */

import fs from "fs";
import path from "path";
import { loadConfig } from "../src/lib/config";
import { exportSessionCsv } from "../src/lib/export";
import { readTextFile } from "../src/lib/files";
import { unresolvedReferences } from "../src/lib/pairs";
import { createPairwiseSession, viewSession } from "../src/lib/session";

function getFlagValue(args: string[], flag: string): string | null {
    const idx = args.indexOf(flag);
    if (
        idx !== -1 &&
        idx + 1 < args.length &&
        !args[idx + 1].startsWith("--")
    ) {
        return args[idx + 1];
    }
    return null;
}

function main() {
    const args = process.argv.slice(2);
    const config = loadConfig();
    const promptsPath = getFlagValue(args, "--prompts") ?? config.promptsPath;
    const comparisonsPath =
        getFlagValue(args, "--comparisons") ?? config.comparisonsPath;
    const progressPath = getFlagValue(args, "--progress") ?? config.progressPath;
    const outPath = getFlagValue(args, "--out");

    const state = createPairwiseSession({
        promptsText: readTextFile(promptsPath),
        comparisonsText: readTextFile(comparisonsPath),
        comparisonsName: path.basename(comparisonsPath),
        progressText: progressPath ? readTextFile(progressPath) : undefined,
    });

    for (const notice of state.notices) {
        const log = notice.level === "warning" ? console.warn : console.log;
        log(`[${notice.level}] ${notice.message}`);
    }
    for (const pair of state.pairs ?? []) {
        for (const err of unresolvedReferences(pair)) {
            console.warn(`  pair ${pair.pairId}: ${err.message}`);
        }
    }

    const view = viewSession(state);
    console.log(`\n=== Summary ===`);
    console.log(`${view.total} pairs, ${view.judged} already chosen, ${view.remaining} remaining`);
    console.log(
        view.done
            ? "All pairs completed."
            : `Next pair: ${view.current?.id ?? "(none)"}`
    );

    if (outPath) {
        fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
        fs.writeFileSync(outPath, exportSessionCsv(state), "utf-8");
        console.log(`Progress CSV: ${outPath}`);
    }
}

try {
    main();
} catch (err) {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
}
