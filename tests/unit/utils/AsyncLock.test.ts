import { AsyncLock } from "../../../src/utils/AsyncLock";

describe("AsyncLock", () => {
  it("should run sections one at a time in arrival order", async () => {
    const lock = new AsyncLock();
    const order: string[] = [];
    let release: () => void = () => undefined;

    const first = lock.runExclusive(async () => {
      order.push("first:start");
      await new Promise<void>((resolve) => {
        release = () => resolve();
      });
      order.push("first:end");
    });
    const second = lock.runExclusive(async () => {
      order.push("second");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(["first:start"]);
    expect(lock.isLocked()).toBe(true);

    release();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isLocked()).toBe(false);
  });

  it("should return the section's result", async () => {
    const lock = new AsyncLock();

    await expect(lock.runExclusive(async () => 42)).resolves.toBe(42);
  });

  it("should keep running after a section fails", async () => {
    const lock = new AsyncLock();

    const failing = lock.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = lock.runExclusive(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
    expect(lock.isLocked()).toBe(false);
  });
});
