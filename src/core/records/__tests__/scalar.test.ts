import { describe, it, expect } from "vitest";
import { scalarFromPrimitive, scalarToPrimitive, scalarAsString } from "../scalar.js";

describe("scalar values", () => {
  it("should tag each KDL value with its type", () => {
    expect(scalarFromPrimitive(true)).toEqual({ type: "boolean", value: true });
    expect(scalarFromPrimitive(7)).toEqual({ type: "integer", value: 7 });
    expect(scalarFromPrimitive(2.5)).toEqual({ type: "float", value: 2.5 });
    expect(scalarFromPrimitive("open")).toEqual({ type: "string", value: "open" });
    expect(scalarFromPrimitive(null)).toEqual({ type: "null" });
  });

  it("should give back the value it was built from", () => {
    for (const value of [false, 0, -3, 0.25, "", "done", null]) {
      expect(scalarToPrimitive(scalarFromPrimitive(value))).toBe(value);
    }
  });

  it("should read strings only from string scalars", () => {
    expect(scalarAsString({ type: "string", value: "/tmp/a" })).toBe("/tmp/a");
    expect(scalarAsString({ type: "integer", value: 1 })).toBeNull();
    expect(scalarAsString({ type: "null" })).toBeNull();
  });
});
