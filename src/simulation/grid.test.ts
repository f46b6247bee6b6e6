import { HeightField } from "./grid";

describe("HeightField", () => {
  it("initializes all heights to zero", () => {
    const field = new HeightField(6, 3);
    expect(field.size).toBe(18);
    for (let y = 0; y < 3; y++) {
      for (let x = 0; x < 6; x++) {
        expect(field.get(x, y)).toBe(0);
      }
    }
  });

  it("stores cells row-major", () => {
    const field = new HeightField(6, 3);
    field.set(4, 2, 1.5);
    expect(field.idx(4, 2)).toBe(16);
    expect(field.heights[16]).toBe(1.5);
    // other cells remain zero
    expect(field.get(0, 0)).toBe(0);
  });

  it("wraps columns: -1 maps to last column, cols maps to column 0", () => {
    const field = new HeightField(6, 3);
    field.set(5, 1, 3.0);
    expect(field.get(-1, 1)).toBe(3.0);

    field.set(0, 1, 7.0);
    expect(field.get(6, 1)).toBe(7.0);
  });

  it("wraps rows", () => {
    const field = new HeightField(6, 3);
    field.set(2, 2, -4.0);
    expect(field.get(2, -1)).toBe(-4.0);
    expect(field.get(2, 5)).toBe(-4.0);
  });

  it("copies heights from an array of matching length", () => {
    const field = new HeightField(2, 2);
    field.copyFrom([1, 2, 3, 4]);
    expect(Array.from(field.heights)).toEqual([1, 2, 3, 4]);
    expect(field.get(1, 1)).toBe(4);
  });

  it("rejects heights of the wrong length", () => {
    const field = new HeightField(2, 2);
    expect(() => field.copyFrom([1, 2, 3])).toThrow(RangeError);
  });

  it("clones into an independent field", () => {
    const field = new HeightField(2, 2);
    field.set(0, 0, 1);
    const copy = field.clone();
    copy.set(0, 0, 9);
    expect(field.get(0, 0)).toBe(1);
    expect(copy.get(0, 0)).toBe(9);
  });
});
