export * from "./crowdfunding/index.js";
export * from "./access/index.js";
export * from "./token/index.js";
export * from "./admin/index.js";
