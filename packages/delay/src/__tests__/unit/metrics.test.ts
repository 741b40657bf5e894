import { describe, expect, it } from "vitest";
import { getDelayLateness, getDelayPostpones, getDelayRearms } from "../../metrics.js";

describe("delay metrics", () => {
  it("should create each instrument once", () => {
    expect(getDelayRearms()).toBe(getDelayRearms());
    expect(getDelayPostpones()).toBe(getDelayPostpones());
    expect(getDelayLateness()).toBe(getDelayLateness());
  });

  it("should accept recordings without a registered meter provider", () => {
    expect(() => {
      getDelayRearms().add(1, { label: "delay" });
      getDelayPostpones().add(1, { label: "delay", outcome: "ok" });
      getDelayLateness().record(3, { label: "delay" });
    }).not.toThrow();
  });
});
