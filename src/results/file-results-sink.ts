/**
 * FileResultsSink — JSONL results log.
 *
 * Appends one JSON object per line. `record` only queues the write, so the
 * consumer never waits on the disk; failed writes are kept for inspection.
 * `restore()` reads the file back, reporting corrupt lines instead of
 * silently dropping them.
 */

import { appendFile, readFile } from "node:fs/promises";
import type { ResultEvent, ResultsSink } from "./types.js";

export interface FileResultsSinkConfig {
	readonly filePath: string;
}

/** A line in the JSONL file that could not be parsed as valid JSON. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

export interface RestoreResult {
	readonly entries: readonly unknown[];
	readonly corruptLines: readonly CorruptLine[];
}

const MAX_WRITE_ERRORS = 10;

export class FileResultsSink implements ResultsSink {
	private readonly filePath: string;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly errors: Error[] = [];
	private closed = false;

	private constructor(config: FileResultsSinkConfig) {
		this.filePath = config.filePath;
	}

	static create(config: FileResultsSinkConfig): FileResultsSink {
		return new FileResultsSink(config);
	}

	record(event: ResultEvent): void {
		if (this.closed) {
			throw new Error("FileResultsSink is closed");
		}
		const line = `${JSON.stringify(event)}\n`;
		this.writeQueue = this.writeQueue.then(() => this.writeOnce(line));
	}

	async flush(): Promise<void> {
		await this.writeQueue;
	}

	/** Marks the sink as closed, draining any pending writes first. */
	async close(): Promise<void> {
		this.closed = true;
		await this.writeQueue;
	}

	/** The most recent write failures, oldest first. */
	writeErrors(): readonly Error[] {
		return this.errors;
	}

	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return { entries: [], corruptLines: [] };
			}
			throw err;
		}

		const entries: unknown[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");
		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) continue;
			try {
				entries.push(JSON.parse(trimmed));
			} catch {
				corruptLines.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
			}
		}
		return { entries, corruptLines };
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			await appendFile(this.filePath, line, "utf-8");
		} catch (err: unknown) {
			const code = isNodeError(err) ? err.code : "UNKNOWN";
			const msg = err instanceof Error ? err.message : String(err);
			this.errors.push(new Error(`FileResultsSink write to ${this.filePath} failed: [${code}] ${msg}`));
			if (this.errors.length > MAX_WRITE_ERRORS) {
				this.errors.shift();
			}
		}
	}
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
