import { describe, expect, it } from "vitest";
import { parseDocument, readEnvelopeArray } from "../../../src/core/document/envelope";
import { MissingEnvelopeFieldError, SchemaMismatchError } from "../../../src/core/exchange/errors";

const PATH = ["data", "body", "data"] as const;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("readEnvelopeArray", () => {
  it("returns the terminal array", () => {
    expect(readEnvelopeArray({ data: { body: { data: [1, 2] } } }, PATH)).toEqual([1, 2]);
  });

  it("reports the outer data segment", () => {
    const error = captureError(() => readEnvelopeArray({}, PATH));
    expect(error).toBeInstanceOf(MissingEnvelopeFieldError);
    expect(error).toMatchObject({ field: "data", path: "data" });
  });

  it("reports the body segment", () => {
    const error = captureError(() => readEnvelopeArray({ data: {} }, PATH));
    expect(error).toBeInstanceOf(MissingEnvelopeFieldError);
    expect(error).toMatchObject({ field: "body", path: "data.body" });
  });

  it("reports the nested data segment", () => {
    const error = captureError(() => readEnvelopeArray({ data: { body: {} } }, PATH));
    expect(error).toBeInstanceOf(MissingEnvelopeFieldError);
    expect(error).toMatchObject({ field: "data", path: "data.body.data" });
  });

  it("treats null as missing", () => {
    const error = captureError(() => readEnvelopeArray({ data: { body: { data: null } } }, PATH));
    expect(error).toMatchObject({ field: "data", path: "data.body.data" });
  });

  it("rejects a terminal value that is not an array", () => {
    const error = captureError(() => readEnvelopeArray({ data: { body: { data: {} } } }, PATH));
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({ path: "data.body.data", expected: "array" });
  });

  it("rejects intermediate values that are not objects", () => {
    expect(captureError(() => readEnvelopeArray({ data: 5 }, PATH))).toMatchObject({
      path: "data",
      expected: "object",
    });
    expect(captureError(() => readEnvelopeArray([], PATH))).toMatchObject({
      path: "$",
      expected: "object",
    });
  });
});

describe("parseDocument", () => {
  it("parses JSON text", () => {
    expect(parseDocument('{"data":[]}')).toEqual({ data: [] });
  });

  it("reports malformed JSON as a schema mismatch", () => {
    const error = captureError(() => parseDocument("{bad"));
    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({ path: "$", expected: "JSON" });
  });
});
