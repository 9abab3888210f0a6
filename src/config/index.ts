export * from "./config.module";
export * from "./config.service";
export * from "./defaults";
export * from "./schema";
export * from "./types";
