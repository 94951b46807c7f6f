import { KeyedMutex } from "./keyed-mutex.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedMutex", () => {
	it("runs work on the same key one at a time", async () => {
		const mutex = new KeyedMutex();
		const order: string[] = [];

		await Promise.all([
			mutex.runExclusive("a", async () => {
				order.push("first:start");
				await tick();
				order.push("first:end");
			}),
			mutex.runExclusive("a", async () => {
				order.push("second:start");
			}),
		]);

		expect(order).toEqual(["first:start", "first:end", "second:start"]);
	});

	it("does not block other keys", async () => {
		const mutex = new KeyedMutex();
		const order: string[] = [];

		await Promise.all([
			mutex.runExclusive("a", async () => {
				await tick();
				order.push("a");
			}),
			mutex.runExclusive("b", async () => {
				order.push("b");
			}),
		]);

		expect(order).toEqual(["b", "a"]);
	});

	it("releases the key after a failure", async () => {
		const mutex = new KeyedMutex();

		await expect(
			mutex.runExclusive("a", async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect(mutex.isLocked("a")).toBe(false);
		await expect(mutex.runExclusive("a", async () => 42)).resolves.toBe(42);
	});
});
