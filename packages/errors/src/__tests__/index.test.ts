import { describe, expect, it } from "vitest";
import { ERROR_CATALOG, PACKAGE_NAME, PostponableError, ValidationError } from "../index.js";

describe("@postponable/errors", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@postponable/errors");
  });

  it("should catalog only the delay codes", () => {
    expect(Object.keys(ERROR_CATALOG)).toEqual([
      "DELAY_CONFIGURATION_INVALID",
      "DELAY_POSTPONE_REJECTED",
    ]);
  });

  describe("PostponableError base class", () => {
    it("should preserve stack trace", () => {
      const error = new ValidationError({ code: "DELAY_CONFIGURATION_INVALID", message: "bad" });
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(PostponableError);
      expect(error.stack).toContain("ValidationError");
    });

    it("should support cause chaining through options", () => {
      const cause = new Error("schema failed");
      const error = new ValidationError({
        code: "DELAY_CONFIGURATION_INVALID",
        message: "config error",
        cause,
      });
      expect(error.cause).toBe(cause);
      expect(error.toJSON().cause).toBe("schema failed");
    });
  });
});
