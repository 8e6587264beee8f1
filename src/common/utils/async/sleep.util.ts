export const sleep = async (delayMs: number): Promise<void> => {
  if (delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    setTimeout(resolve, delayMs);
  });
};
