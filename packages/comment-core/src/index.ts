import { buildReplyTree } from './replies'
import { collectComments } from './collector'

export type {
  ReplyTreeOptions,
  ReplyTreeResult,
  CollectOptions,
  CollectProgressEvent,
  CollectProgressReporter,
  CollectResult,
} from './types'
export type { StepResult } from './step'

export { buildReplyTree, collectComments }

export default {
  buildReplyTree,
  collectComments,
}
