export {
  assignBuckets,
  bucketSizes,
  computeGroupReturns,
  type GroupReturnOptions,
} from "./grouping.js";
export type { GroupReturns } from "./types.js";
