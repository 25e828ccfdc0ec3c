import type { ServerNotification } from '@modelcontextprotocol/sdk/types.js';
import { debugWarn, errorMessage, type RetroactiveProgressEvent, type RetroactiveRunOptions } from '@mailwarden/core';

type SendNotification = (notification: ServerNotification) => Promise<void>;

export interface ProgressReporter {
  runOptions: RetroactiveRunOptions;
  /** Resolves once every queued notification has been handed to the transport */
  flush(): Promise<void>;
}

function describeEvent(event: RetroactiveProgressEvent): string {
  switch (event.type) {
    case 'page':
      return `Listed page ${event.page}: ${event.found} matching message(s) so far`;
    case 'batch':
      return `Batch ${event.batch}/${event.totalBatches}: ${event.size} message(s), ${event.failed} failed`;
    case 'done':
      return `Done: ${event.state.processedCount}/${event.state.totalFound} message(s) updated`;
  }
}

/**
 * Turns retroactive run events into `notifications/progress` for the request
 * that carried `progressToken`. Progress is a step counter so it only grows.
 */
export function createProgressReporter(
  progressToken: string | number | undefined,
  send: SendNotification,
  signal?: AbortSignal,
): ProgressReporter {
  if (progressToken === undefined) {
    return { runOptions: { signal }, flush: async () => {} };
  }

  let step = 0;
  let queue: Promise<void> = Promise.resolve();

  const onProgress = (event: RetroactiveProgressEvent) => {
    step += 1;
    const notification: ServerNotification = {
      method: 'notifications/progress',
      params: { progressToken, progress: step, message: describeEvent(event) },
    };
    queue = queue
      .then(() => send(notification))
      .catch((err: unknown) => debugWarn('mcp', `Progress notification failed: ${errorMessage(err)}`));
  };

  return { runOptions: { onProgress, signal }, flush: () => queue };
}
