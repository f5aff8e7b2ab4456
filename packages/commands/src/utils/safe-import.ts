/**
 * Dynamic import with timeout protection
 *
 * Guards against modules whose initialization never settles (circular
 * dependencies, top-level await on something that never resolves).
 *
 * @param modulePath - Absolute path to the module to import
 * @param timeoutMs - Timeout in milliseconds (default: 5000)
 * @throws Error if import times out or fails
 */
export async function safeImport(
  modulePath: string,
  timeoutMs: number = 5000,
): Promise<unknown> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Import timeout after ${timeoutMs}ms: ${modulePath}`)),
      timeoutMs,
    );
  });
  try {
    const loaded: unknown = await Promise.race([import(/* @vite-ignore */ modulePath), timeout]);
    return loaded;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Check if an error is an import timeout error
 */
export function isImportTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.message.startsWith("Import timeout");
}
