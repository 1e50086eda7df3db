import { EntityLockService } from "./entity-lock.service";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("EntityLockService", () => {
  const originalTimeout = process.env.LOCK_WAIT_TIMEOUT_MS;

  afterEach(() => {
    if (originalTimeout === undefined) delete process.env.LOCK_WAIT_TIMEOUT_MS;
    else process.env.LOCK_WAIT_TIMEOUT_MS = originalTimeout;
  });

  it("runs sections on the same key one at a time, in arrival order", async () => {
    const locks = new EntityLockService();
    const gate = deferred();
    const log: string[] = [];

    const first = locks.runExclusive(["order:1"], async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
    });
    const second = locks.runExclusive(["order:1"], () => {
      log.push("second");
    });
    const third = locks.runExclusive(["order:1"], () => {
      log.push("third");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(log).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(log).toEqual(["first:start", "first:end", "second", "third"]);
  });

  it("does not make unrelated keys wait", async () => {
    const locks = new EntityLockService();
    const gate = deferred();

    const blocked = locks.runExclusive(["order:1"], () => gate.promise);
    await expect(locks.runExclusive(["order:2"], () => "done")).resolves.toBe("done");

    gate.resolve();
    await blocked;
  });

  it("holds every requested key for the duration of the section", async () => {
    const locks = new EntityLockService();
    const seen = await locks.runExclusive(["order:9", "driver:4", "order:9"], () => [
      locks.isHeld("driver:4"),
      locks.isHeld("order:9"),
    ]);

    expect(seen).toEqual([true, true]);
    expect(locks.isHeld("driver:4")).toBe(false);
    expect(locks.isHeld("order:9")).toBe(false);
  });

  it("releases keys when the section throws", async () => {
    const locks = new EntityLockService();
    await expect(
      locks.runExclusive(["order:1"], () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(locks.isHeld("order:1")).toBe(false);
  });

  it("gives up after the configured wait with a retryable LockTimeout", async () => {
    process.env.LOCK_WAIT_TIMEOUT_MS = "20";
    const locks = new EntityLockService();
    const gate = deferred();

    const holder = locks.runExclusive(["driver:1"], () => gate.promise);
    await expect(locks.runExclusive(["driver:1"], () => "never")).rejects.toMatchObject({
      kind: "Unavailable",
      code: "LockTimeout",
    });

    gate.resolve();
    await holder;
    expect(locks.isHeld("driver:1")).toBe(false);
    await expect(locks.runExclusive(["driver:1"], () => "after")).resolves.toBe("after");
  });

  it("does not deadlock when two sections name the same keys in opposite order", async () => {
    const locks = new EntityLockService();
    const results = await Promise.all([
      locks.runExclusive(["order:1", "driver:1"], async () => {
        await Promise.resolve();
        return "a";
      }),
      locks.runExclusive(["driver:1", "order:1"], async () => {
        await Promise.resolve();
        return "b";
      }),
    ]);

    expect(results).toEqual(["a", "b"]);
  });

  it("builds keys that sort drivers before orders", () => {
    const keys = [EntityLockService.orderKey("x"), EntityLockService.driverKey("x")].sort();
    expect(keys).toEqual(["driver:x", "order:x"]);
  });
});
