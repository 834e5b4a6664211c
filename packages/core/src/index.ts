export * from "./models/common";
export * from "./models/trains";
export * from "./models/closures";
export * from "./models/status";
export * from "./api/types";
export * from "./api/endpoints";
