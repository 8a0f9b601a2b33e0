/**
 * ReceiptLens – Validator unit tests
 */

import {
  ReceiptAnalysisError,
  validateImageInput,
  validateScanOptions,
} from "../core/validator";

describe("validateImageInput", () => {
  it("passes for a base64 payload", () => {
    expect(validateImageInput({ type: "base64", data: "aGVsbG8=" })).toEqual({
      valid: true,
      errors: [],
    });
  });

  it("passes for a data URL", () => {
    const { valid } = validateImageInput({
      type: "base64",
      data: "data:image/png;base64,aGVsbG8=",
    });
    expect(valid).toBe(true);
  });

  it("passes for a uri with dimensions", () => {
    const { valid } = validateImageInput({
      type: "uri",
      path: "/tmp/receipt.jpg",
      width: 1200,
      height: 1600,
    });
    expect(valid).toBe(true);
  });

  it("fails when the image is missing", () => {
    expect(validateImageInput(undefined).errors).toEqual(["`image` is required."]);
  });

  it("fails for empty base64", () => {
    expect(validateImageInput({ type: "base64", data: "" }).errors).toEqual([
      "`image.data` is empty.",
    ]);
  });

  it("fails for a data URL with no payload", () => {
    expect(
      validateImageInput({ type: "base64", data: "data:image/jpeg;base64," }).errors,
    ).toEqual(["`image.data` is empty."]);
  });

  it("fails for text that is not base64", () => {
    expect(validateImageInput({ type: "base64", data: "@@@" }).errors).toEqual([
      "`image.data` is not valid base64.",
    ]);
  });

  it("fails for an empty path", () => {
    expect(validateImageInput({ type: "uri", path: " " }).valid).toBe(false);
  });

  it("fails for an empty buffer", () => {
    expect(validateImageInput({ type: "buffer", data: new Uint8Array(0) }).errors).toEqual([
      "`image.data` buffer is empty.",
    ]);
  });

  it("fails for non-positive dimensions", () => {
    const { errors } = validateImageInput({
      type: "buffer",
      data: new Uint8Array([1, 2, 3]),
      width: 0,
      height: -5,
    });
    expect(errors).toHaveLength(2);
  });
});

describe("validateScanOptions", () => {
  const image = { type: "uri", path: "/tmp/receipt.jpg" } as const;

  it("accepts ISO 639 language codes", () => {
    expect(validateScanOptions({ image, language: "en" }).valid).toBe(true);
    expect(validateScanOptions({ image, language: "zh-Hant" }).valid).toBe(true);
  });

  it("rejects a language name", () => {
    const { valid, errors } = validateScanOptions({ image, language: "english" });
    expect(valid).toBe(false);
    expect(errors).toEqual(['`language` must be an ISO 639 code such as "en".']);
  });
});

describe("ReceiptAnalysisError", () => {
  it("carries a code and cause", () => {
    const cause = new Error("root");
    const err = new ReceiptAnalysisError("failed", "RECOGNITION_FAILED", cause);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ReceiptAnalysisError");
    expect(err.message).toBe("failed");
    expect(err.code).toBe("RECOGNITION_FAILED");
    expect(err.cause).toBe(cause);
  });
});
