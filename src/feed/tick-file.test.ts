import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { rawTick } from "../testing/fixtures.js";
import { readTickFile, toTickLines } from "./tick-file.js";

describe("tick files", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "ticks-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads back what toTickLines wrote", async () => {
		const records = [rawTick(100, 0), rawTick(101, 1_000)];
		const path = join(dir, "session.jsonl");
		await writeFile(path, toTickLines(records), "utf-8");

		const contents = await readTickFile(path);
		expect(contents.records).toEqual(records);
		expect(contents.corruptLines).toEqual([]);
	});

	it("reports corrupt lines with their line numbers", async () => {
		const path = join(dir, "broken.jsonl");
		await writeFile(path, `${JSON.stringify(rawTick(100))}\n{oops\n\n${JSON.stringify(rawTick(101, 1))}\n`);

		const contents = await readTickFile(path);
		expect(contents.records).toHaveLength(2);
		expect(contents.corruptLines).toEqual([{ lineNumber: 2, raw: "{oops" }]);
	});
});
