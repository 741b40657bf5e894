import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PostponableDelay } from "../../delay.js";
import { PostponeResponse } from "../../response.js";
import { createFakeTimerClock } from "../fixtures/clock.js";

const mocks = vi.hoisted(() => {
  return {
    rearms: { add: vi.fn() },
    postpones: { add: vi.fn() },
    lateness: { record: vi.fn() },
  };
});

vi.mock("../../metrics.js", () => ({
  getDelayRearms: () => mocks.rearms,
  getDelayPostpones: () => mocks.postpones,
  getDelayLateness: () => mocks.lateness,
}));

describe("delay metric recording", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should count every postpone request with its outcome", () => {
    const delay = new PostponableDelay(100, { clock: createFakeTimerClock(), label: "lease" });
    const handle = delay.getHandle();

    expect(handle.postpone(200)).toBe(PostponeResponse.Ok);
    expect(handle.postpone(150)).toBe(PostponeResponse.CantResolveEarlier);

    expect(mocks.postpones.add.mock.calls).toEqual([
      [1, { label: "lease", outcome: "ok" }],
      [1, { label: "lease", outcome: "cant-resolve-earlier" }],
    ]);
  });

  it("should count re-arms and record lateness on resolution", async () => {
    const delay = new PostponableDelay(40, { clock: createFakeTimerClock(), label: "lease" });
    const handle = delay.getHandle();
    const waiting = delay.then(() => undefined);

    expect(handle.postpone(60)).toBe(PostponeResponse.Ok);
    await vi.advanceTimersByTimeAsync(60);
    await waiting;

    expect(handle.postpone(70)).toBe(PostponeResponse.AlreadyResolved);
    expect(mocks.rearms.add.mock.calls).toEqual([[1, { label: "lease" }]]);
    expect(mocks.lateness.record.mock.calls).toEqual([[0, { label: "lease" }]]);
    expect(mocks.postpones.add.mock.calls).toEqual([
      [1, { label: "lease", outcome: "ok" }],
      [1, { label: "lease", outcome: "already-resolved" }],
    ]);
  });
});
