import test from "node:test";
import assert from "node:assert/strict";
import { createQuantity, parseQuantity } from "../src/services/quantity.js";
import { ValidationError } from "../src/middleware/error.js";

test("createQuantity returns a frozen value object", () => {
  const quantity = createQuantity(250, "g");

  assert.deepEqual(quantity, { value: 250, unit: "g" });
  assert.equal(Object.isFrozen(quantity), true);
});

test("createQuantity accepts zero and keeps units verbatim", () => {
  assert.deepEqual(createQuantity(0, "Szczypta"), { value: 0, unit: "Szczypta" });
});

test("createQuantity rejects negative values", () => {
  assert.throws(
    () => createQuantity(-1, "g"),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, "Invalid quantity");
      assert.deepEqual(error.details, [{ path: "value", message: "Quantity value cannot be negative" }]);
      return true;
    }
  );
});

test("createQuantity rejects values above the maximum", () => {
  assert.throws(
    () => createQuantity(1_000_000, "g"),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.details[0]?.message === "Quantity value cannot exceed 999999.99"
  );
});

test("createQuantity reports every invalid field at once", () => {
  assert.throws(
    () => createQuantity(-5, ""),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.deepEqual(
        error.details.map((issue) => issue.path),
        ["value", "unit"]
      );
      return true;
    }
  );
});

test("parseQuantity splits value and unit", () => {
  assert.deepEqual(parseQuantity("2 szt"), { value: 2, unit: "szt" });
  assert.deepEqual(parseQuantity("  1.5  cups "), { value: 1.5, unit: "cups" });
  assert.deepEqual(parseQuantity("0.5 łyżeczki cukru"), { value: 0.5, unit: "łyżeczki cukru" });
});

test("parseQuantity rejects text without a numeric value and unit", () => {
  for (const text of ["250", "abc g", ""]) {
    assert.throws(
      () => parseQuantity(text),
      (error: unknown) => {
        assert.ok(error instanceof ValidationError);
        assert.equal(error.message, `Invalid quantity format: ${text}`);
        assert.deepEqual(error.details, [{ path: "quantity", message: "Expected '<value> <unit>'" }]);
        return true;
      }
    );
  }
});

test("parseQuantity applies the value rules", () => {
  assert.throws(() => parseQuantity("-3 g"), ValidationError);
});
