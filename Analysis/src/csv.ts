import fs from "node:fs";
import { pipeline } from "node:stream/promises";
import { parse } from "csv-parse";
import Papa from "papaparse";

export type CsvRow = Record<string, string>;

function toRow(record: unknown): CsvRow {
    const row: CsvRow = {};
    if (typeof record !== "object" || record === null) return row;
    for (const [k, v] of Object.entries(record)) {
        row[k] = v == null ? "" : String(v);
    }
    return row;
}

/**
 * Streams the rows of a CSV file with a header line and resolves to that
 * header. Throws before the first row when the header lacks one of `required`,
 * and after the stream when there was no header line at all.
 */
export async function streamCsv(
    file: string,
    required: readonly string[],
    fn: (row: CsvRow, index: number) => void | Promise<void>
): Promise<string[]> {
    let columns: string[] | undefined;
    let i = 0;
    await pipeline(
        fs.createReadStream(file),
        parse({
            bom: true,
            skip_empty_lines: true,
            columns: (header: string[]) => {
                const missing = required.filter(c => !header.includes(c));
                if (missing.length) {
                    throw new Error(
                        `Missing required columns in ${file}: ${missing.join(", ")} (available: ${header.join(", ")})`
                    );
                }
                columns = header;
                return header;
            },
        }),
        async function* (src: AsyncIterable<unknown>) {
            for await (const record of src) await fn(toRow(record), i++);
        }
    );

    // csv-parse never calls `columns` for an empty file
    if (!columns) {
        if (required.length) {
            throw new Error(`Missing required columns in ${file}: ${required.join(", ")} (available: none)`);
        }
        return [];
    }
    return columns;
}

export async function readCsv(file: string, required: readonly string[] = []) {
    const rows: CsvRow[] = [];
    const columns = await streamCsv(file, required, row => {
        rows.push(row);
    });
    return { columns, rows };
}

// header is always written, even with no rows
export function writeCsv<C extends string>(
    file: string,
    columns: readonly C[],
    rows: ReadonlyArray<Record<C, string | number>>
) {
    const csv = Papa.unparse({
        fields: [...columns],
        data: rows.map(r => columns.map(c => r[c])),
    });
    fs.writeFileSync(file, csv, "utf8");
}
