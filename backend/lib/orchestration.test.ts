import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { RenderQueue } from "./orchestration.js";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("RenderQueue", () => {
  it("returns from submit before the job starts", async () => {
    const queue = new RenderQueue();
    let started = false;
    queue.submit("t1", async () => {
      started = true;
    });
    assert.equal(started, false);
    await queue.onIdle();
    assert.equal(started, true);
  });

  it("runs jobs in submission order, one at a time by default", async () => {
    const queue = new RenderQueue();
    const events: string[] = [];
    for (const id of ["a", "b", "c"]) {
      queue.submit(id, async () => {
        events.push(`start ${id}`);
        await new Promise(r => setTimeout(r, 5));
        events.push(`end ${id}`);
      });
    }
    await queue.onIdle();
    assert.deepEqual(events, ["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  it("never exceeds the configured concurrency", async () => {
    const queue = new RenderQueue(2);
    const gates = [deferred(), deferred(), deferred()];
    let peak = 0;
    gates.forEach((gate, i) => {
      queue.submit(`t${i}`, async () => {
        peak = Math.max(peak, queue.running);
        await gate.promise;
      });
    });
    await new Promise(r => setImmediate(r));
    assert.equal(queue.running, 2);
    assert.equal(queue.size, 1);
    gates.forEach(gate => gate.resolve());
    await queue.onIdle();
    assert.equal(peak, 2);
    assert.equal(queue.running, 0);
  });

  it("keeps going after a job throws", async () => {
    const queue = new RenderQueue();
    let ranSecond = false;
    queue.submit("bad", async () => {
      throw new Error("boom");
    });
    queue.submit("good", async () => {
      ranSecond = true;
    });
    await queue.onIdle();
    assert.equal(ranSecond, true);
  });

  it("rejects a non-positive concurrency", () => {
    assert.throws(() => new RenderQueue(0), /positive integer/);
  });
});
