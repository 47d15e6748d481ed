export { LumaAdapter, buildLumaParams, mapLumaStatus } from "./LumaAdapter.js";
