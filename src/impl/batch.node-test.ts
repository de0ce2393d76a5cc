import {describe, test, expect} from "./node-test-utils.js";
import {chunk, eachChunk} from "./batch.js";

describe("chunk", () => {
	test("splits into consecutive chunks", () => {
		expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
	});

	test("a size larger than the input gives one chunk", () => {
		expect(chunk(["a", "b"], 1000)).toEqual([["a", "b"]]);
	});

	test("empty input gives no chunks", () => {
		expect(chunk([], 3)).toEqual([]);
	});

	test("size must be a positive integer", () => {
		expect(() => chunk([1], 0)).toThrow(RangeError);
		expect(() => chunk([1], -2)).toThrow(RangeError);
		expect(() => chunk([1], 1.5)).toThrow(RangeError);
	});
});

describe("eachChunk", () => {
	test("runs chunks in order and concatenates results", async () => {
		const seen: string[] = [];
		const results = await eachChunk([1, 2, 3, 4, 5, 6, 7], 3, async (batch, index, total) => {
			seen.push(`${index + 1}/${total}:${batch.join(",")}`);
			return batch.map((n) => n * 10);
		});

		expect(seen).toEqual(["1/3:1,2,3", "2/3:4,5,6", "3/3:7"]);
		expect(results).toEqual([10, 20, 30, 40, 50, 60, 70]);
	});

	test("never overlaps chunks", async () => {
		let running = 0;
		let maxRunning = 0;
		await eachChunk([1, 2, 3, 4], 1, async (batch) => {
			running++;
			maxRunning = Math.max(maxRunning, running);
			await new Promise((resolve) => setTimeout(resolve, 1));
			running--;
			return batch;
		});
		expect(maxRunning).toBe(1);
	});

	test("stops at the first failing chunk", async () => {
		const processed: number[] = [];
		await expect(
			eachChunk([1, 2, 3], 1, async (batch, index) => {
				if (index === 1) throw new Error("chunk failed");
				processed.push(...batch);
				return batch;
			}),
		).rejects.toThrow("chunk failed");
		expect(processed).toEqual([1]);
	});
});
