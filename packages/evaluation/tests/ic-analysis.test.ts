import { describe, expect, it } from "vitest";
import { analyzeICDecay, evaluateIC, interpretIC } from "../src/ic/analysis.js";
import { computeICSeries, summarizeICSeries } from "../src/ic/metrics.js";
import type { ICDecayResult, ICSummary } from "../src/ic/types.js";
import { alignPanels } from "../src/panel/align.js";
import { syntheticPanels } from "./fixtures.js";

function summary(overrides: Partial<ICSummary>): ICSummary {
  return {
    mean: 0.06,
    std: 0.1,
    icir: 0.6,
    winRate: 0.55,
    nPeriods: 100,
    nValid: 90,
    ...overrides,
  };
}

describe("analyzeICDecay", () => {
  const { factor, returns } = syntheticPanels(40, 20, 11);
  const pair = alignPanels(factor, returns);

  it("reproduces the lagged rank IC at horizon one", () => {
    const decay = analyzeICDecay(pair, [1, 3]);
    const rankIC = summarizeICSeries(computeICSeries(pair));
    expect(decay.icByHorizon["1"]).toBeCloseTo(rankIC.mean ?? Number.NaN, 10);
    expect(decay.horizons).toEqual([1, 3]);
  });

  it("picks the horizon with the highest mean IC", () => {
    const decay = analyzeICDecay(pair, [1, 3, 5]);
    const values = [1, 3, 5].map((h) => decay.icByHorizon[String(h)] ?? Number.NEGATIVE_INFINITY);
    expect(decay.optimalIC).toBe(Math.max(...values));
    expect(decay.icByHorizon[String(decay.optimalHorizon)]).toBe(decay.optimalIC);
  });

  it("reports a horizon longer than the data as missing", () => {
    const decay = analyzeICDecay(pair, [100]);
    expect(decay.icByHorizon["100"]).toBeNull();
    expect(decay.optimalHorizon).toBeNull();
    expect(decay.halfLife).toBeNull();
  });

  it("rejects non-positive horizons", () => {
    expect(() => analyzeICDecay(pair, [0])).toThrow("positive integers");
  });
});

describe("interpretIC", () => {
  it("grades strong, moderate and weak factors", () => {
    expect(interpretIC(summary({}))).toBe("strong");
    expect(interpretIC(summary({ mean: 0.03, icir: 0.4 }))).toBe("moderate");
    expect(interpretIC(summary({ mean: 0.01, icir: 0.4 }))).toBe("weak");
  });

  it("grades missing statistics as weak", () => {
    expect(interpretIC(summary({ icir: null }))).toBe("weak");
  });
});

describe("evaluateIC", () => {
  it("explains the verdict", () => {
    const verdict = evaluateIC(summary({}));
    expect(verdict.interpretation).toBe("strong");
    expect(verdict.recommendation).toBe("accept");
    expect(verdict.details).toEqual([
      "Mean IC: 0.0600",
      "IC Std: 0.1000",
      "ICIR: 0.600",
      "Win Rate: 55.0%",
      "Valid Periods: 90 / 100",
    ]);
  });

  it("adds decay details when given", () => {
    const decay: ICDecayResult = {
      icByHorizon: { "1": 0.04, "5": 0.06, "10": 0.02 },
      horizons: [1, 5, 10],
      optimalHorizon: 5,
      optimalIC: 0.06,
      halfLife: 7.5,
    };
    const verdict = evaluateIC(summary({ mean: 0.01 }), decay);
    expect(verdict.recommendation).toBe("reject");
    expect(verdict.details.slice(5)).toEqual([
      "Optimal Horizon: 5 periods",
      "IC at Optimal: 0.0600",
      "Half-life: 7.5 periods",
    ]);
  });

  it("prints missing statistics as n/a", () => {
    const verdict = evaluateIC(summary({ std: null, icir: null, winRate: null }));
    expect(verdict.details[1]).toBe("IC Std: n/a");
    expect(verdict.details[3]).toBe("Win Rate: n/a");
  });
});
