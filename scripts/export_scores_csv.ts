/**
 * Flatten a score export into a CSV for spreadsheet analysis.
 *
 * Usage: npx tsx scripts/export_scores_csv.ts [--input path] [--output path] [--dry-run]
 *
 * Flags:
 *   --dry-run   Print the row count without writing the CSV
 *
 * Defaults to data/scores.json and writes items.csv. Columns are
 * item,id,content,score; id and content come from each item's payload.
 */

import fs from "fs";
import path from "path";
import { flattenScoresCsv } from "../src/lib/export";
import { readJsonFile } from "../src/lib/files";

function getFlagValue(
    args: string[],
    flag: string,
    defaultValue: string
): string {
    const idx = args.indexOf(flag);
    if (
        idx !== -1 &&
        idx + 1 < args.length &&
        !args[idx + 1].startsWith("--")
    ) {
        return args[idx + 1];
    }
    return defaultValue;
}

function parseArgs(argv: string[]) {
    const args = argv.slice(2);
    return {
        dryRun: args.includes("--dry-run"),
        inputPath: getFlagValue(
            args,
            "--input",
            path.join(process.cwd(), "data", "scores.json")
        ),
        outputPath: getFlagValue(args, "--output", "items.csv"),
    };
}

function main() {
    const { dryRun, inputPath, outputPath } = parseArgs(process.argv);

    const csv = flattenScoresCsv(readJsonFile(inputPath));
    const rowCount = csv.split("\r\n").length - 1;

    console.log(`Input: ${path.basename(inputPath)} (${rowCount} items)`);
    if (dryRun) {
        console.log("[DRY RUN] No file written.");
        return;
    }

    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    fs.writeFileSync(outputPath, csv, "utf-8");
    console.log(`Wrote ${outputPath}`);
}

try {
    main();
} catch (err) {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
}
