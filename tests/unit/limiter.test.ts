import { createLimiter } from "../../src/shared/concurrency/limiter";

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 20));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 6 }, () => limit(work)));
    expect(maxActive).toBe(2);
    expect(limit.activeCount()).toBe(0);
    expect(limit.pendingCount()).toBe(0);
  });

  it("starts queued tasks in submission order", async () => {
    const limit = createLimiter(1);
    const started: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        limit(async () => {
          started.push(n);
        })
      )
    );

    expect(started).toEqual([1, 2, 3]);
  });

  it("keeps running after a task fails", async () => {
    const limit = createLimiter(1);

    const failing = limit(async () => {
      throw new Error("task failed");
    });
    const next = limit(async () => "done");

    await expect(failing).rejects.toThrow("task failed");
    await expect(next).resolves.toBe("done");
  });

  it("rejects invalid concurrency", () => {
    expect(() => createLimiter(0)).toThrow("concurrency must be an integer >= 1");
    expect(() => createLimiter(1.5)).toThrow("concurrency must be an integer >= 1");
  });
});
