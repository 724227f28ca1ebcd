export { sanitizeCommentText } from './core/sanitize'
export {
  type WalkEntry,
  commentTypeForDepth,
  walkForest,
  toFlatRow,
  flattenForest,
  countNodes,
} from './core/flatten'
export { renderCommentTree } from './core/render'
export {
  type SerializedComment,
  serializeForest,
  escapeCsvField,
  flatRowToCells,
  toCsv,
} from './core/export'
