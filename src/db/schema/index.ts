export * from "./managed-servers.js";
export * from "./server-orders.js";
export * from "./vswitches.js";
