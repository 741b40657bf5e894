import { describe, expect, it } from "vitest";
import { fromNow } from "../../clock.js";
import { PostponableDelay } from "../../delay.js";
import { assertPostponed, isPostponed, PostponeResponse } from "../../response.js";

// Real timers: completion must never be early; lateness is bounded loosely
const UNIT_MS = 25;
const MARGIN_MS = 150;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    globalThis.setTimeout(resolve, ms);
  });
}

describe("PostponableDelay on real timers", () => {
  it("resolves no earlier than its target without postponement", async () => {
    const target = fromNow(4 * UNIT_MS);
    await sleep(2 * UNIT_MS);

    await new PostponableDelay(target);
    const end = performance.now();

    expect(end).toBeGreaterThanOrEqual(target);
    expect(end - target).toBeLessThan(MARGIN_MS);
  });

  it("resolves no earlier than a postponed target", async () => {
    const delay = new PostponableDelay(fromNow(4 * UNIT_MS), { label: "timing" });
    const handle = delay.getHandle();
    await sleep(2 * UNIT_MS);

    const target = fromNow(4 * UNIT_MS);
    assertPostponed(handle.postpone(target));
    expect(handle.postpone(target - UNIT_MS)).toBe(PostponeResponse.CantResolveEarlier);

    await delay;
    const end = performance.now();

    expect(handle.postpone(end)).toBe(PostponeResponse.AlreadyResolved);
    expect(end).toBeGreaterThanOrEqual(target);
    expect(end - target).toBeLessThan(MARGIN_MS);
  });

  it("lets another task postpone while the delay is awaited", async () => {
    const delay = new PostponableDelay(fromNow(UNIT_MS));
    const handle = delay.getHandle();
    let accepted = delay.target;

    const postponer = (async () => {
      for (let i = 0; i < 3; i++) {
        await sleep(UNIT_MS / 5);
        const target = fromNow(UNIT_MS);
        if (isPostponed(handle.postpone(target))) {
          accepted = target;
        }
      }
    })();

    await delay;
    const end = performance.now();
    await postponer;

    expect(end).toBeGreaterThanOrEqual(accepted);
  });
});
