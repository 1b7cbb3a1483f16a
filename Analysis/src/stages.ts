/**
 * CSV stages of the trip pipeline. Each one reads the previous stage's file,
 * applies one transformation per row and writes its own file:
 *
 *   trip2.csv  --simplify-->     trip3.csv  ("Total Trip" added)
 *   trip3.csv  --split-->        trip4.csv  ("Ascending", "Descending")
 *   trip4.csv  --transitions-->  final.csv  ("Transition", "Count", "Type")
 */

import fs from "node:fs";

import { ensureDirectory, type AnalysisConfig } from "./config.js";
import { streamCsv, writeCsv, type CsvRow } from "./csv.js";
import { simplifyRoute } from "./simplify.js";
import { splitRoute } from "./split.js";
import { buildTransitionTable, countTransitions, TRANSITION_COLUMNS } from "./transitions.js";

export const OPTIMIZED_ROUTE = "Optimized Route";
export const TOTAL_TRIP = "Total Trip";
export const HALF_COLUMNS = ["Ascending", "Descending"] as const;

const PROGRESS_EVERY = 100;

function requireInput(file: string, previous: string) {
    if (!fs.existsSync(file)) {
        throw new Error(`Input file not found: ${file} (run the ${previous} stage first)`);
    }
}

export async function runSimplifyStage(config: AnalysisConfig): Promise<number> {
    const input = config.trip2Csv;
    requireInput(input, "raw trip");
    console.log(`[simplify] reading ${input}`);

    const rows: CsvRow[] = [];
    const header = await streamCsv(input, [OPTIMIZED_ROUTE], row => {
        rows.push({ ...row, [TOTAL_TRIP]: simplifyRoute(row[OPTIMIZED_ROUTE]) });
    });
    console.log(`[simplify] simplified ${rows.length} trip routes`);

    const columns = header.includes(TOTAL_TRIP) ? header : [...header, TOTAL_TRIP];
    writeCsv(ensureDirectory(config.trip3Csv), columns, rows);
    console.log(`[simplify] wrote ${rows.length} rows to ${config.trip3Csv}`);
    return rows.length;
}

export async function runSplitStage(config: AnalysisConfig): Promise<number> {
    const input = config.trip3Csv;
    requireInput(input, "simplify");
    console.log(`[split] reading ${input}`);

    const rows: { Ascending: string; Descending: string }[] = [];
    await streamCsv(input, [TOTAL_TRIP], (row, i) => {
        const { ascending, descending } = splitRoute(row[TOTAL_TRIP]);
        rows.push({ Ascending: ascending, Descending: descending });
        if ((i + 1) % PROGRESS_EVERY === 0) {
            console.log(`[split] processed ${i + 1} records`);
        }
    });
    console.log(`[split] completed ${rows.length} records`);

    writeCsv(ensureDirectory(config.trip4Csv), HALF_COLUMNS, rows);
    console.log(`[split] wrote ${rows.length} rows to ${config.trip4Csv}`);
    return rows.length;
}

export async function runTransferCountStage(config: AnalysisConfig): Promise<number> {
    const input = config.trip4Csv;
    requireInput(input, "split");
    console.log(`[transitions] reading ${input}`);

    const ascending: string[] = [];
    const descending: string[] = [];
    await streamCsv(input, HALF_COLUMNS, row => {
        ascending.push(row.Ascending);
        descending.push(row.Descending);
    });

    const counts = {
        ascending: countTransitions(ascending),
        descending: countTransitions(descending),
    };
    console.log(`[transitions] unique transitions: ascending=${counts.ascending.size} descending=${counts.descending.size}`);

    const table = buildTransitionTable(counts);
    const top = [...table].sort((a, b) => b.Count - a.Count).slice(0, 10);
    console.log("[transitions] top 10 (all types):");
    for (const r of top) console.log(`  ${r.Transition}: ${r.Count} (${r.Type})`);

    writeCsv(ensureDirectory(config.finalCsv), TRANSITION_COLUMNS, table);
    console.log(`[transitions] wrote ${table.length} rows to ${config.finalCsv}`);
    return table.length;
}
