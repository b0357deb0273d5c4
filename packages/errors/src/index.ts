export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { hasErrno, ioErrorDetails, isErrnoException } from "./core/utils/io-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  IoErrorDetails,
  SerializedError,
} from "./ports/error"
