/**
 * Stack trace capture utility
 *
 * Wraps V8's Error.captureStackTrace so error constructors can drop their
 * own frames without `any` casts.
 */

interface V8Error {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8Error {
  return 'captureStackTrace' in errorConstructor && typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Captures a stack trace for the given error object.
 *
 * On V8 (Node.js) frames above and including `constructorOpt` are omitted.
 * Elsewhere this is a no-op; the Error constructor already filled `stack`.
 *
 * @example
 * ```typescript
 * class MyError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     this.name = 'MyError';
 *     captureStackTrace(this, MyError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
