export * from "./document-writer.service";
export * from "./io.module";
export * from "./logger.service";
