export {
  BaseError,
  type BaseErrorOptions,
  errorMessage,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { isAppError } from "./core/is-app-error"
export { toAppError } from "./core/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
