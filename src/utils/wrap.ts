/**
 * Tuple-based result returned by every graph call, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a Promise factory, capturing both synchronous throws and rejections.
 * @example
 * const [error, blob] = await safeWrapAsync(() => handle.readFile());
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Collapses a tuple into a single slot value: the error when there is one, the data otherwise.
 * Batch results are reported this way, one slot per call.
 */
export function settled<DataType>(wrapped: SafeWrap<Error, DataType>): Error | DataType {
  const [error, data] = wrapped;
  if (error) {
    return error;
  }

  return data;
}
