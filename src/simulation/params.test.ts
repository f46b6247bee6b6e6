import { resolveParams, resolveDimensions } from "./params";
import { InvalidArgumentError } from "../errors";

describe("resolveParams", () => {
  it("fills in defaults", () => {
    expect(resolveParams()).toEqual({ D: 0.8, Q: 0.6, L0: 7.3, b: 2.0, diagonals: "symmetric" });
  });

  it("keeps given values, including zero and negatives", () => {
    expect(resolveParams({ D: 0, Q: 0, L0: -1, b: -2, diagonals: "legacy" }))
      .toEqual({ D: 0, Q: 0, L0: -1, b: -2, diagonals: "legacy" });
  });

  it("rejects a negative entrainment rate", () => {
    expect(() => resolveParams({ Q: -1 })).toThrow("Q must be non-negative, got -1");
  });

  it("rejects non-finite parameters", () => {
    expect(() => resolveParams({ b: NaN })).toThrow(InvalidArgumentError);
  });
});

describe("resolveDimensions", () => {
  it("defaults to a 100 × 50 grid", () => {
    expect(resolveDimensions()).toEqual({ cols: 100, rows: 50 });
  });

  it("names the offending dimension", () => {
    expect(() => resolveDimensions({ rows: 0 })).toThrow("rows must be a positive integer, got 0");
  });
});
