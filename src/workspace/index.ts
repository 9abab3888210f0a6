export * from "./docker.service";
export * from "./git.service";
export * from "./process-runner";
export * from "./workspace.module";
export * from "./workspace.service";
