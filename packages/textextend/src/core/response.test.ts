import { describe, expect, it } from "vitest";
import { interpretResponse } from "./response.js";

describe("interpretResponse", () => {
  describe("success", () => {
    it("extracts generated_text from a single result", () => {
      expect(interpretResponse([{ generated_text: "Hello world" }])).toEqual({
        type: "success",
        text: "Hello world",
      });
    });

    it("ignores extra fields on the result", () => {
      const payload = [{ generated_text: "Hi", details: { finish_reason: "length" } }];

      expect(interpretResponse(payload)).toEqual({ type: "success", text: "Hi" });
    });

    it("accepts the text verbatim, even when empty", () => {
      expect(interpretResponse([{ generated_text: "" }])).toEqual({ type: "success", text: "" });
      expect(interpretResponse([{ generated_text: "  a\n\n\nb  " }])).toEqual({
        type: "success",
        text: "  a\n\n\nb  ",
      });
    });

    it("checks for success before looking for an error field", () => {
      const payload = [{ generated_text: "ok", error: ["ignored"] }];

      expect(interpretResponse(payload)).toEqual({ type: "success", text: "ok" });
    });
  });

  describe("service error", () => {
    it("extracts the error messages", () => {
      expect(interpretResponse({ error: ["rate limited"] })).toEqual({
        type: "service-error",
        messages: ["rate limited"],
      });
    });

    it("accepts an empty list and extra fields", () => {
      expect(interpretResponse({ error: [], warnings: ["slow"] })).toEqual({
        type: "service-error",
        messages: [],
      });
    });

    it("keeps messages of any type", () => {
      expect(interpretResponse({ error: ["bad input", 422] })).toEqual({
        type: "service-error",
        messages: ["bad input", 422],
      });
    });
  });

  describe("malformed", () => {
    const cases: Array<[string, unknown]> = [
      ["an unrelated object", { unexpected: "shape" }],
      ["an error string instead of a list", { error: "Model is loading", estimated_time: 20 }],
      ["an empty list", []],
      ["two results", [{ generated_text: "a" }, { generated_text: "b" }]],
      ["a non-string generated_text", [{ generated_text: 5 }]],
      ["a bare string", "Hello world"],
      ["null", null],
      ["undefined", undefined],
    ];

    for (const [label, payload] of cases) {
      it(`treats ${label} as malformed`, () => {
        const outcome = interpretResponse(payload);

        expect(outcome.type).toBe("malformed");
        expect(outcome).toEqual({ type: "malformed", response: payload });
      });
    }

    it("carries the exact payload object", () => {
      const payload = { unexpected: "shape" };
      const outcome = interpretResponse(payload);

      expect(outcome.type === "malformed" && outcome.response).toBe(payload);
    });
  });
});
