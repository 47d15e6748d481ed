export {
  RunwayAdapter,
  buildRunwayParams,
  mapRunwayStatus,
  type RunwayAccountInfo,
} from "./RunwayAdapter.js";
