import { describe, expect, it } from "vitest";
import { WriteQueue } from "../write-queue.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("WriteQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new WriteQueue();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`start ${name}`);
      await tick();
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(task("a")), queue.run(task("b")), queue.run(task("c"))]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  it("hands a failure to its own caller and keeps going", async () => {
    const queue = new WriteQueue();

    const failed = queue.run(async () => {
      throw new Error("disk full");
    });
    const next = queue.run(async () => "written");

    await expect(failed).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("written");
  });

  it("drains every queued task", async () => {
    const queue = new WriteQueue();
    let done = 0;
    void queue.run(async () => {
      await tick();
      done++;
    });
    void queue.run(async () => {
      done++;
    });

    expect(queue.size).toBe(2);
    await queue.drain();

    expect(done).toBe(2);
    expect(queue.size).toBe(0);
  });
});
