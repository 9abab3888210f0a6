export * from "./assembly.module";
export * from "./assembly.service";
