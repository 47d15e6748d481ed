export * from "./session.js";
export * from "./json.js";
