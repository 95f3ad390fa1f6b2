export {
  collectAnchors,
  externallyReferencedAnchors,
  findAliases,
  resolveAlias,
  walk,
} from "./anchors"
export {
  createEditSession,
  type ChangeCause,
  type EditSessionController,
  type EditSessionOptions,
} from "./createEditSession"
export { DocumentTree, NodeWriter, type DeleteOptions } from "./DocumentTree"
export {
  EditCoreError,
  UsageError,
  type EditErrorCode,
  type EditResult,
} from "./error"
export { HistoryTree, type HistoryNodeInfo } from "./HistoryTree"
export {
  fromJSONValue,
  toJSONValue,
  type AliasResolver,
  type FromJSONOptions,
  type JSONObject,
  type JSONValue,
} from "./json"
export * from "./node"
export {
  childPath,
  formatPath,
  freezePath,
  isAncestorPath,
  lastIndex,
  nearestExistingPath,
  parentPath,
  pathsEqual,
  resolvePath,
  ROOT_PATH,
  type Path,
  type PathFormat,
} from "./path"
export { createSnapshot, type Snapshot } from "./snapshot"
export { nodesEqual, valuesEqual } from "./utils"
