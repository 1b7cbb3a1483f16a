import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { ensureDirectory, loadConfig } from "../config.js";

describe("loadConfig", () => {
    it("defaults every file to the working directory", () => {
        expect(loadConfig({})).toEqual({
            baseDataDir: ".",
            trip2Csv: path.join(".", "trip2.csv"),
            trip3Csv: path.join(".", "trip3.csv"),
            trip4Csv: path.join(".", "trip4.csv"),
            finalCsv: path.join(".", "final.csv"),
        });
    });

    it("resolves overrides under the base directory", () => {
        const config = loadConfig({ BASE_DATA_DIR: "/srv/trips", FINAL_CSV: "out/final.csv", TRIP2_CSV: "" });
        expect(config.finalCsv).toBe(path.join("/srv/trips", "out/final.csv"));
        expect(config.trip2Csv).toBe(path.join("/srv/trips", "trip2.csv"));
    });
});

describe("ensureDirectory", () => {
    it("creates the parent directory of a file", () => {
        const root = fs.mkdtempSync(path.join(os.tmpdir(), "trip-config-"));
        const file = path.join(root, "a", "b", "final.csv");

        expect(ensureDirectory(file)).toBe(file);
        expect(fs.statSync(path.join(root, "a", "b")).isDirectory()).toBe(true);

        fs.rmSync(root, { recursive: true, force: true });
    });
});
