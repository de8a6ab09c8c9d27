/**
 * An abort signal wired to Ctrl+C until released. While held, SIGINT aborts
 * the signal instead of ending the process.
 */
export interface InterruptGuard {
  readonly signal: AbortSignal;
  release(): void;
}

export const listenForInterrupt = (): InterruptGuard => {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  return {
    signal: controller.signal,
    release: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
};
