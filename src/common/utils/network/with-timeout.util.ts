export const withTimeout = async <TResult>(
  operation: Promise<TResult>,
  timeoutMs: number,
  createTimeoutError: () => Error,
): Promise<TResult> => {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeout: Promise<never> = new Promise<never>(
    (_resolve: (value: never) => void, reject: (reason: Error) => void): void => {
      timeoutHandle = setTimeout((): void => {
        reject(createTimeoutError());
      }, timeoutMs);
    },
  );

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timeoutHandle);
  }
};
