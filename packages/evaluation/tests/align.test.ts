import { describe, expect, it } from "vitest";
import { AlignmentError } from "../src/errors.js";
import { alignPanels, canonicalInstrument } from "../src/panel/align.js";
import { createPanel, panelsEqual } from "../src/panel/panel.js";

const factor = createPanel(
  ["2024-01-02", "2024-01-03", "2024-01-04"],
  ["000002.SZ", "000001.SZ", "600000.SH"],
  [
    [1, 2, 3],
    [4, 5, 6],
    [7, null, 9],
  ]
);

const returns = createPanel(
  ["2024-01-03", "2024-01-04", "2024-01-05"],
  ["000001", "000002", "300001"],
  [
    [0.1, 0.2, 0.3],
    [0.4, 0.5, 0.6],
    [0.7, 0.8, 0.9],
  ]
);

describe("canonicalInstrument", () => {
  it("strips a dotted exchange suffix", () => {
    expect(canonicalInstrument("000001.SZ")).toBe("000001");
    expect(canonicalInstrument(" 600000.SH ")).toBe("600000");
  });

  it("leaves plain identifiers alone", () => {
    expect(canonicalInstrument("000001")).toBe("000001");
  });
});

describe("alignPanels", () => {
  it("keeps common periods and canonical instruments, sorted", () => {
    const pair = alignPanels(factor, returns);

    expect(pair.factor.periods).toEqual(["2024-01-03", "2024-01-04"]);
    expect(pair.factor.instruments).toEqual(["000001", "000002"]);
    expect(pair.factor.values).toEqual([
      [5, 4],
      [null, 7],
    ]);

    expect(pair.returns.periods).toEqual(pair.factor.periods);
    expect(pair.returns.instruments).toEqual(pair.factor.instruments);
    expect(pair.returns.values).toEqual([
      [0.1, 0.2],
      [0.4, 0.5],
    ]);
  });

  it("is idempotent", () => {
    const once = alignPanels(factor, returns);
    const twice = alignPanels(once.factor, once.returns);
    expect(panelsEqual(twice.factor, once.factor)).toBe(true);
    expect(panelsEqual(twice.returns, once.returns)).toBe(true);
  });

  it("does not modify its inputs", () => {
    const before = structuredClone(factor);
    alignPanels(factor, returns);
    expect(factor).toEqual(before);
  });

  it("fails without common periods", () => {
    const later = createPanel(["2025-01-02"], ["000001"], [[0.1]]);
    expect(() => alignPanels(factor, later)).toThrow(AlignmentError);
  });

  it("fails without common instruments", () => {
    const other = createPanel(["2024-01-03"], ["999999"], [[0.1]]);
    expect(() => alignPanels(factor, other)).toThrow("share no instruments");
  });

  it("fails when two columns collapse onto one identifier", () => {
    const ambiguous = createPanel(["2024-01-03"], ["000001.SZ", "000001.SH"], [[1, 2]]);
    expect(() => alignPanels(ambiguous, returns)).toThrow(AlignmentError);
  });
});
