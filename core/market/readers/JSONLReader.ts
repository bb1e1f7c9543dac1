import fs from "node:fs";
import readline from "node:readline";

export interface JSONLOptions {
    filter?: (line: unknown) => boolean;
    limit?: number;
}

export interface JSONLResult {
    readonly records: unknown[];

    /** 1-based line numbers that were not valid JSON */
    readonly invalidLines: number[];
}

/**
 * Read a JSON-lines file. A missing file yields no records.
 */
export async function readJSONL(filePath: string, options: JSONLOptions = {}): Promise<JSONLResult> {
    if (!fs.existsSync(filePath)) {
        return { records: [], invalidLines: [] };
    }

    const records: unknown[] = [];
    const invalidLines: number[] = [];
    const fileStream = fs.createReadStream(filePath);
    const rl = readline.createInterface({
        input: fileStream,
        crlfDelay: Infinity
    });

    let lineNumber = 0;
    try {
        for await (const line of rl) {
            lineNumber++;
            if (!line.trim()) continue;

            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch {
                invalidLines.push(lineNumber);
                continue;
            }

            if (!options.filter || options.filter(parsed)) {
                records.push(parsed);
            }
            if (options.limit && records.length >= options.limit) {
                break;
            }
        }
    } finally {
        rl.close();
        fileStream.destroy();
    }

    return { records, invalidLines };
}
