import { describe, expect, it } from "vitest";
import { Diagnostics, recoverPeriod } from "../src/diagnostics.js";
import {
  AlignmentError,
  ComputationError,
  InsufficientDataError,
  isRecoverable,
} from "../src/errors.js";

describe("recoverPeriod", () => {
  it("returns the computed value", () => {
    expect(recoverPeriod<number | null>("rank_ic", () => 0.5, null)).toBe(0.5);
  });

  it("falls back and counts recoverable failures", () => {
    const diagnostics = new Diagnostics();
    const value = recoverPeriod(
      "grouping",
      () => {
        throw new InsufficientDataError("grouping", 10, 3, "2024-01-02");
      },
      -1,
      diagnostics
    );
    expect(value).toBe(-1);
    expect(diagnostics.count("grouping")).toBe(1);
    expect(diagnostics.snapshot()).toEqual({
      total: 1,
      byStage: { grouping: { insufficientData: 1, computation: 0 } },
    });
  });

  it("lets fatal errors through", () => {
    expect(() =>
      recoverPeriod(
        "rank_ic",
        () => {
          throw AlignmentError.noCommonPeriods(3, 4);
        },
        null
      )
    ).toThrow(AlignmentError);
  });
});

describe("errors", () => {
  it("carry a code and context", () => {
    const error = new InsufficientDataError("long_short", 10, 4, "2024-01-02");
    expect(error.code).toBe("INSUFFICIENT_DATA");
    expect(error.message).toBe("[long_short] 4 valid instruments at 2024-01-02, 10 required");
    expect(new ComputationError("flat", "ic").message).toBe("[ic] flat");
  });

  it("separate recoverable from fatal", () => {
    expect(isRecoverable(new ComputationError("flat"))).toBe(true);
    expect(isRecoverable(AlignmentError.noCommonInstruments(1, 1))).toBe(false);
    expect(isRecoverable(new Error("boom"))).toBe(false);
  });
});

describe("Diagnostics", () => {
  it("counts per stage and kind", () => {
    const diagnostics = new Diagnostics();
    diagnostics.record("ic", "computation");
    diagnostics.record("ic", "insufficientData");
    diagnostics.record("long_only", "insufficientData");
    expect(diagnostics.count("ic")).toBe(2);
    expect(diagnostics.count("ic", "computation")).toBe(1);
    expect(diagnostics.count("decay")).toBe(0);
    expect(diagnostics.total).toBe(3);
  });
});
