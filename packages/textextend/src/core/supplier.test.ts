import { inspect } from "node:util";
import { describe, expect, it, vi } from "vitest";
import { isSupplier, Supplier } from "./supplier.js";

describe("Supplier", () => {
  it("calls the wrapped function on every resolution", () => {
    let calls = 0;
    const supplier = new Supplier(() => ++calls);

    expect(supplier.resolve()).toBe(1);
    expect(supplier.resolve()).toBe(2);
    expect(calls).toBe(2);
  });

  it("does not call the function when constructed", () => {
    const supply = vi.fn(() => 7);

    new Supplier(supply);

    expect(supply).not.toHaveBeenCalled();
  });

  it("names the wrapped function in its string form", () => {
    const pickTopK = () => 40;
    function makeSeed() {
      return 7;
    }

    expect(String(new Supplier(pickTopK))).toBe("Supplier(pickTopK)");
    expect(String(new Supplier(makeSeed))).toBe("Supplier(makeSeed)");
  });

  it("shows the wrapped function when inspected", () => {
    const pickTopK = () => 40;

    expect(inspect(new Supplier(pickTopK))).toBe("Supplier(pickTopK)");
    expect(inspect({ top_k: new Supplier(pickTopK) })).toBe("{ top_k: Supplier(pickTopK) }");
  });
});

describe("isSupplier", () => {
  it("recognizes suppliers only", () => {
    expect(isSupplier(new Supplier(() => 1))).toBe(true);
    expect(isSupplier(() => 1)).toBe(false);
    expect(isSupplier(0.75)).toBe(false);
    expect(isSupplier(null)).toBe(false);
  });
});
