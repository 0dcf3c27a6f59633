const waitSeconds = async (seconds: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return;
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, seconds * 1000);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export { waitSeconds };
