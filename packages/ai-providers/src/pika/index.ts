export { PikaAdapter, buildPikaParams, mapPikaStatus, type PikaUsageStats } from "./PikaAdapter.js";
