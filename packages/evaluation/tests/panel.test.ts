import { describe, expect, it } from "vitest";
import { PanelShapeError } from "../src/errors.js";
import {
  columnAt,
  createPanel,
  mapCells,
  mapColumns,
  negatePanel,
  panelsEqual,
} from "../src/panel/panel.js";
import { SMALL_FACTOR } from "./fixtures.js";

describe("createPanel", () => {
  it("turns NaN into missing", () => {
    const panel = createPanel(["2024-01-02"], ["A", "B"], [[Number.NaN, 1]]);
    expect(panel.values).toEqual([[null, 1]]);
  });

  it("copies its inputs", () => {
    const row = [1, 2];
    const panel = createPanel(["2024-01-02"], ["A", "B"], [row]);
    row[0] = 99;
    expect(panel.values[0]).toEqual([1, 2]);
  });

  it("rejects duplicate periods", () => {
    expect(() => createPanel(["2024-01-02", "2024-01-02"], ["A"], [[1], [2]])).toThrow(
      PanelShapeError
    );
  });

  it("rejects periods out of order", () => {
    expect(() => createPanel(["2024-01-03", "2024-01-02"], ["A"], [[1], [2]])).toThrow(
      "period 2024-01-02 follows 2024-01-03"
    );
  });

  it("rejects duplicate instruments", () => {
    expect(() => createPanel(["2024-01-02"], ["A", "A"], [[1, 2]])).toThrow(
      "duplicate instrument A"
    );
  });

  it("rejects ragged rows", () => {
    expect(() => createPanel(["2024-01-02", "2024-01-03"], ["A", "B"], [[1, 2], [3]])).toThrow(
      PanelShapeError
    );
  });

  it("rejects a row count that differs from the period count", () => {
    expect(() => createPanel(["2024-01-02"], ["A"], [])).toThrow("0 rows for 1 periods");
  });
});

describe("cell helpers", () => {
  it("reads a column in period order", () => {
    expect(columnAt(SMALL_FACTOR, 0)).toEqual([1, 3, 2, 1]);
  });

  it("maps present cells only", () => {
    const panel = createPanel(["2024-01-02"], ["A", "B"], [[2, null]]);
    expect(mapCells(panel, (v) => v * 10).values).toEqual([[20, null]]);
  });

  it("negates without producing negative zero", () => {
    const panel = createPanel(["2024-01-02"], ["A", "B", "C"], [[0, 1.5, null]]);
    const negated = negatePanel(panel);
    expect(Object.is(negated.values[0]?.[0], 0)).toBe(true);
    expect(negated.values[0]?.[1]).toBe(-1.5);
    expect(negated.values[0]?.[2]).toBeNull();
  });

  it("leaves the source panel untouched", () => {
    negatePanel(SMALL_FACTOR);
    expect(SMALL_FACTOR.values[0]).toEqual([1, 2, 3]);
  });

  it("maps columns and checks their length", () => {
    const doubled = mapColumns(SMALL_FACTOR, (column) => column.map((v) => (v === null ? null : v * 2)));
    expect(doubled.values[1]).toEqual([6, 2, 4]);
    expect(() => mapColumns(SMALL_FACTOR, () => [1])).toThrow(PanelShapeError);
  });

  it("compares panels by labels and cells", () => {
    const copy = createPanel(SMALL_FACTOR.periods, SMALL_FACTOR.instruments, SMALL_FACTOR.values);
    expect(panelsEqual(SMALL_FACTOR, copy)).toBe(true);
    expect(panelsEqual(SMALL_FACTOR, negatePanel(copy))).toBe(false);
  });
});
