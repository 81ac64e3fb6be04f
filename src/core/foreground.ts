import { formatProgressLine, type ProgressEvent } from "./ProgressChannel.js";
import type { CollectionSession, SessionManager } from "./SessionManager.js";

export interface ForegroundOptions {
  /** Export the log to CSV beside it once collection is done. */
  exportCsv: boolean;
  write: (line: string) => void;
}

/**
 * Follow a started session to its end, rendering every progress notification once,
 * in publication order, until the optional export has finished. Returns the exit code.
 */
export async function runInForeground(
  manager: SessionManager,
  session: CollectionSession,
  options: ForegroundOptions,
): Promise<number> {
  const render = (event: ProgressEvent): void => options.write(formatProgressLine(event));
  // What the collector published synchronously on start, then live.
  session.progress.drain().forEach(render);
  const unsubscribe = session.progress.onProgress(render);
  try {
    const outcome = await session.completion;
    if (outcome.state === "failed") return 1;
    if (!options.exportCsv) return 0;
    const result = await manager.exportSession(session.id);
    return result.ok ? 0 : 1;
  } finally {
    unsubscribe();
  }
}
