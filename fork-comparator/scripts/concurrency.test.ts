import assert from "node:assert/strict";
import { test } from "node:test";
import { mapLimit } from "./concurrency";
import { sleep } from "./retry";

test("mapLimit keeps input order and bounds in-flight calls", async () => {
  let inFlight = 0;
  let peak = 0;
  const results = await mapLimit([30, 10, 20, 5], 2, async (ms, index) => {
    inFlight += 1;
    peak = Math.max(peak, inFlight);
    await sleep(ms);
    inFlight -= 1;
    return `${index}:${ms}`;
  });
  assert.deepEqual(results, ["0:30", "1:10", "2:20", "3:5"]);
  assert.equal(peak, 2);
});

test("mapLimit starts nothing new after abort", async () => {
  const controller = new AbortController();
  const started: number[] = [];
  await assert.rejects(
    () =>
      mapLimit(
        [1, 2, 3, 4],
        1,
        async (item) => {
          started.push(item);
          if (item === 2) controller.abort(new Error("stop"));
          return item;
        },
        controller.signal,
      ),
    /stop/,
  );
  assert.deepEqual(started, [1, 2]);
});

test("mapLimit rejects a zero limit", async () => {
  await assert.rejects(() => mapLimit([1], 0, async (item) => item), /limit >= 1/);
});
