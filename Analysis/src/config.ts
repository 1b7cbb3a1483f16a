import fs from "node:fs";
import path from "node:path";

export type AnalysisConfig = {
    baseDataDir: string;
    trip2Csv: string;   // raw routes ("Optimized Route")
    trip3Csv: string;   // + "Total Trip"
    trip4Csv: string;   // "Ascending", "Descending"
    finalCsv: string;   // "Transition", "Count", "Type"
};

type Env = Record<string, string | undefined>;

/**
 * Resolves file locations from the environment. Only the entry point loads
 * .env; everything else gets the resulting object passed in.
 */
export function loadConfig(env: Env = process.env): AnalysisConfig {
    const baseDataDir = env.BASE_DATA_DIR || ".";
    const file = (key: string, fallback: string) => path.join(baseDataDir, env[key] || fallback);

    return {
        baseDataDir,
        trip2Csv: file("TRIP2_CSV", "trip2.csv"),
        trip3Csv: file("TRIP3_CSV", "trip3.csv"),
        trip4Csv: file("TRIP4_CSV", "trip4.csv"),
        finalCsv: file("FINAL_CSV", "final.csv"),
    };
}

export function ensureDirectory(file: string) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    return file;
}
