// src/core/namespace/index.ts

export { Namespace, type NamespaceValue, type NamespaceEvent } from "./namespace";
export { MessageChannel } from "./channel";
export { normalizePath, isUnder } from "./path";
export { SOURCE_PATH, MANIFEST_PATH, LAST_MESSAGE_PATH, DRAW_PATH, kernelPath } from "./paths";
