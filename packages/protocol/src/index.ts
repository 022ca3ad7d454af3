export { CommandError, errorKind, isCommandError } from "./core/command-error"
export { argToText, encodeArg, isArgument } from "./core/encode-arg"
export { Messages } from "./core/messages"
export {
  errorEnvelopeSchema,
  failure,
  isErrorReply,
  pipelineReplySchema,
  singleReplySchema,
  success,
} from "./core/reply"
export type { Argument, Command, WireArg } from "./ports/argument"
export type { ErrorReply, Reply, ReplyBatch, SuccessReply } from "./ports/reply"
