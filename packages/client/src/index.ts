export { Client, type ClientOptions } from "./core/client"
export {
  DecodeError,
  RequestError,
  type RequestErrorCode,
  TransportError,
  type TransportErrorOptions,
} from "./core/errors"
export { type Destination, Request } from "./core/request"
export { Slot, slot } from "./core/slot"
export type { FetchFn } from "./ports/fetch"
export { CommandError, isCommandError, type ReplyBatch } from "@kvrest/protocol"
