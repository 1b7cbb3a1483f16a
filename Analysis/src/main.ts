/**
 * Entry point: runs the trip analysis stages over the CSV files configured
 * in .env (see .env.example).
 *
 *   node dist/Analysis/src/main.js [simplify|split|transitions|all]
 */

import "dotenv/config";

import { loadConfig, type AnalysisConfig } from "./config.js";
import { runSimplifyStage, runSplitStage, runTransferCountStage } from "./stages.js";

const STAGES: Record<string, (config: AnalysisConfig) => Promise<number>> = {
    simplify: runSimplifyStage,
    split: runSplitStage,
    transitions: runTransferCountStage,
};

async function run() {
    const which = process.argv[2] ?? "all";
    const names = which === "all" ? Object.keys(STAGES) : [which];
    const config = loadConfig();

    for (const name of names) {
        const stage = STAGES[name];
        if (!stage) {
            throw new Error(`unknown stage "${name}", expected one of: ${Object.keys(STAGES).join(", ")}, all`);
        }
        await stage(config);
    }
    console.log("All requested stages done.");
}

run().catch(err => {
    console.error("trip analysis failed:", err);
    process.exit(1);
});
