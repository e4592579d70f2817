import { bench, describe } from "vitest";
import { TransferBuffer } from "../src/ingest/transfer-buffer.js";

const buffer = new TransferBuffer<number>(1_024);

describe("TransferBuffer", () => {
	bench("push + pop one item", () => {
		buffer.push(1);
		buffer.pop();
	});

	bench("fill 1024 then drain", () => {
		for (let i = 0; i < 1_024; i++) buffer.push(i);
		while (buffer.pop() !== null) {}
	});
});
