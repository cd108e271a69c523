/** The part of an esbuild `BuildContext` needed to shut a watcher down. */
export interface WatchContext {
  dispose(): Promise<void>;
}

/** Empties `contexts` and disposes every watcher that was in it. */
export async function disposeWatchContexts(contexts: WatchContext[]): Promise<void> {
  const pending = contexts.splice(0, contexts.length);
  await Promise.all(pending.map((ctx) => ctx.dispose()));
}
