export * from "./errors";
export * from "./document/config-document";
export * from "./document/document-merger";
export * from "./scripts/script-injector";
export * from "./scripts/workspace-reference-rewriter";
export * from "./nodes/node-placeholder-generator";
export * from "./variables/text-variable-expander";
