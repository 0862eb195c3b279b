// tests/validation/checks.test.ts
import { describe, expect, it } from "vitest";

import { bool, chosenVariant, chosenVariants, float, int, intList, text, textList } from "../../src/responses";
import { allOf, anyOf, confirm, float as floatKind, input, int as intKind, list, oneOf, unitVariant } from "../../src/survey";
import { checkAnswer, expectedValueType } from "../../src/validation";

describe("expectedValueType", () => {
  it("should map each kind to the tag it answers with", () => {
    expect(expectedValueType(input())).toBe("text");
    expect(expectedValueType(confirm())).toBe("bool");
    expect(expectedValueType(list({ type: "float" }))).toBe("float_list");
    expect(expectedValueType(oneOf([unitVariant("A")]))).toBe("chosen_variant");
    expect(expectedValueType(allOf([]))).toBeUndefined();
  });
});

describe("checkAnswer", () => {
  it("should accept a matching value", () => {
    expect(checkAnswer(input(), text("hello"))).toEqual({ valid: true });
    expect(checkAnswer(confirm(), bool(true))).toEqual({ valid: true });
  });

  it("should reject a mismatched tag", () => {
    expect(checkAnswer(intKind(), text("8080"))).toEqual({ valid: false, message: "Expected int, got text" });
  });

  it("should reject answers to structural groups", () => {
    expect(checkAnswer(allOf([]), text("x"))).toEqual({
      valid: false,
      message: "Questions of kind all_of take no answer",
    });
  });

  it("should enforce numeric bounds", () => {
    const port = intKind({ min: 1, max: 65535 });
    expect(checkAnswer(port, int(0))).toEqual({ valid: false, message: "Value must be at least 1" });
    expect(checkAnswer(port, int(70000))).toEqual({ valid: false, message: "Value must be at most 65535" });
    expect(checkAnswer(port, int(443))).toEqual({ valid: true });
    expect(checkAnswer(floatKind({ max: 1 }), float(1.5))).toEqual({ valid: false, message: "Value must be at most 1" });
  });

  it("should reject fractional and non-finite numbers", () => {
    expect(checkAnswer(intKind(), int(1.5))).toEqual({ valid: false, message: "Value must be a whole number" });
    expect(checkAnswer(floatKind(), float(Number.NaN))).toEqual({ valid: false, message: "Value must be a finite number" });
  });

  it("should enforce list sizes and element bounds", () => {
    expect(checkAnswer(list({ type: "text" }, { maxItems: 1 }), textList(["a", "b"]))).toEqual({
      valid: false,
      message: "At most 1 item(s) allowed",
    });
    expect(checkAnswer(list({ type: "int" }, { minItems: 2 }), intList([1]))).toEqual({
      valid: false,
      message: "At least 2 item(s) required",
    });
    expect(checkAnswer(list({ type: "int", max: 5 }), intList([1, 9]))).toEqual({
      valid: false,
      message: "Value must be at most 5",
    });
  });

  it("should check variant selections against the variant count", () => {
    const payment = oneOf([unitVariant("Cash"), unitVariant("Card")]);
    expect(checkAnswer(payment, chosenVariant(2))).toEqual({
      valid: false,
      message: "Selection 2 is out of range (2 options)",
    });

    const features = anyOf([unitVariant("A"), unitVariant("B")]);
    expect(checkAnswer(features, chosenVariants([])).valid).toBe(true);
    expect(checkAnswer(features, chosenVariants([1, 1]))).toEqual({
      valid: false,
      message: "Each option can be selected once",
    });
  });
});
