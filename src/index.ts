export * from "./app.module";
export * from "./assembly";
export * from "./cli";
export * from "./config";
export * from "./core";
export * from "./io";
export * from "./workspace";
