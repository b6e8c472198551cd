export * from "./audit.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./explorer.js";
export * from "./explorerView.js";
export * from "./exporters.js";
export * from "./liveTail.js";
export * from "./mermaid.js";
export * from "./metrics.js";
export * from "./parsers/index.js";
export * from "./runs.js";
export * from "./tree.js";
export { durationBetween, expandHome, isRootParentId, parseRfc3339, truncateText, ZERO_SPAN_ID } from "./utils.js";
