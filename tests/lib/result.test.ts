import { describe, it, expect } from "vitest";

import { ok, err, tryCatch } from "@/lib/result.js";

describe("Result", () => {
  describe("ok", () => {
    it("creates successful result", () => {
      const result = ok(42);
      expect(result).toEqual({ success: true, data: 42 });
    });
  });

  describe("err", () => {
    it("creates failed result", () => {
      const error = new Error("test error");
      const result = err(error);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBe(error);
      }
    });
  });

  describe("tryCatch", () => {
    it("wraps successful function", () => {
      expect(tryCatch(() => 42)).toEqual({ success: true, data: 42 });
    });

    it("catches thrown error", () => {
      const error = new Error("thrown");
      const result = tryCatch(() => {
        throw error;
      });
      expect(result).toEqual({ success: false, error });
    });

    it("wraps non-Error throws", () => {
      const result = tryCatch(() => {
        throw "string error";
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("string error");
      }
    });
  });
});
