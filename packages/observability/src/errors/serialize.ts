export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
  cause?: SerializedError;
}

export const serializeError = (error: unknown): SerializedError => {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) {
      serialized.cause = serializeError(error.cause);
    }
    return serialized;
  }
  return { message: String(error) };
};
