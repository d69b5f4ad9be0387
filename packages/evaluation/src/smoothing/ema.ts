import { isPresent } from "../panel/panel.js";
import type { Cell } from "../panel/types.js";

/**
 * Exponential moving average, s_t = α·x_t + (1 - α)·s_{t-1}, seeded with
 * the first observation. Missing inputs repeat the last state. After a
 * gap of g periods the old state is weighted by (1 - α)^g:
 *
 *   s_t = ((1 - α)^g · s + α · x_t) / ((1 - α)^g + α)
 */
export function exponentialSmoothing(series: readonly Cell[], alpha: number): Cell[] {
  if (!(alpha > 0 && alpha <= 1)) {
    throw new Error(`EMA alpha must be in (0, 1], got ${alpha}`);
  }

  let state: number | null = null;
  let lastObserved = -1;
  return series.map((value, t) => {
    if (!isPresent(value)) {
      return state;
    }
    if (state === null) {
      state = value;
    } else {
      const decay = (1 - alpha) ** (t - lastObserved);
      state = (decay * state + alpha * value) / (decay + alpha);
    }
    lastObserved = t;
    return state;
  });
}
