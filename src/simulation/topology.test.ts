import { GridTopology } from "./topology";
import { InvalidArgumentError } from "../errors";

describe("GridTopology", () => {
  it("wraps boundary columns and rows to the opposite edge", () => {
    const topo = new GridTopology(4, 3);
    expect(topo.xMinus[topo.index(0, 0)]).toBe(3);
    expect(topo.xPlus[topo.index(3, 0)]).toBe(0);
    expect(topo.yMinus[topo.index(0, 0)]).toBe(2);
    expect(topo.yPlus[topo.index(0, 2)]).toBe(0);
  });

  it("stores identity coordinates for every cell", () => {
    const topo = new GridTopology(4, 3);
    const i = topo.index(2, 1);
    expect(i).toBe(6);
    expect(topo.x[i]).toBe(2);
    expect(topo.y[i]).toBe(1);
    expect(topo.xMinus[i]).toBe(1);
    expect(topo.xPlus[i]).toBe(3);
    expect(topo.yMinus[i]).toBe(0);
    expect(topo.yPlus[i]).toBe(2);
  });

  it.each([[1, 1], [2, 2], [2, 3], [5, 4], [100, 50]])(
    "plus undoes minus and stays in range on a %i × %i grid",
    (cols, rows) => {
      const topo = new GridTopology(cols, rows);
      expect(topo.size).toBe(cols * rows);
      for (let i = 0; i < topo.size; i++) {
        // xPlus of the cell whose column is xMinus[i], in the same row
        const left = topo.index(topo.xMinus[i], topo.y[i]);
        expect(topo.xPlus[left]).toBe(topo.x[i]);
        const below = topo.index(topo.x[i], topo.yMinus[i]);
        expect(topo.yPlus[below]).toBe(topo.y[i]);

        for (const v of [topo.xMinus[i], topo.xPlus[i]]) {
          expect(v).toBeGreaterThanOrEqual(0);
          expect(v).toBeLessThan(cols);
        }
        for (const v of [topo.yMinus[i], topo.yPlus[i]]) {
          expect(v).toBeGreaterThanOrEqual(0);
          expect(v).toBeLessThan(rows);
        }
      }
    },
  );

  it("wraps a single column onto itself", () => {
    const topo = new GridTopology(1, 2);
    expect(topo.xMinus[0]).toBe(0);
    expect(topo.xPlus[1]).toBe(0);
    expect(topo.yPlus[1]).toBe(0);
  });

  it("rejects non-positive or fractional dimensions", () => {
    expect(() => new GridTopology(0, 4)).toThrow(InvalidArgumentError);
    expect(() => new GridTopology(4, -1)).toThrow(InvalidArgumentError);
    expect(() => new GridTopology(2.5, 4)).toThrow(InvalidArgumentError);
  });
});
