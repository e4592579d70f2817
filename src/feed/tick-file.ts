/**
 * JSONL tick recordings: one raw tick record per line.
 *
 * Lines that are not valid JSON are reported, not silently skipped. The
 * records themselves are left raw; the replay source normalizes them.
 */

import { readFile } from "node:fs/promises";

/** A line that could not be parsed as JSON. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

export interface TickFileContents {
	readonly records: readonly unknown[];
	readonly corruptLines: readonly CorruptLine[];
}

export async function readTickFile(filePath: string): Promise<TickFileContents> {
	const content = await readFile(filePath, "utf-8");
	const lines = content.split("\n");
	const records: unknown[] = [];
	const corruptLines: CorruptLine[] = [];

	for (let i = 0; i < lines.length; i++) {
		const trimmed = lines[i]?.trim() ?? "";
		if (trimmed.length === 0) continue;
		try {
			records.push(JSON.parse(trimmed));
		} catch {
			corruptLines.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
		}
	}

	return { records, corruptLines };
}

/** Serialize records as JSONL, the inverse of {@link readTickFile}. */
export function toTickLines(records: Iterable<unknown>): string {
	let out = "";
	for (const record of records) {
		out += `${JSON.stringify(record)}\n`;
	}
	return out;
}
