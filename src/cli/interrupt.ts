export const CANCEL_NOTICE = 'Cancelling: stopping the current video and skipping the rest (press Ctrl+C again to quit now)';

export interface InterruptActions {
  warn(message: string): void;
  exit(code: number): void;
}

/**
 * First Ctrl+C aborts the batch, which also stops the running yt-dlp
 * process; a second one exits immediately.
 */
export function createInterruptHandler(controller: AbortController, actions: InterruptActions): () => void {
  return () => {
    if (controller.signal.aborted) {
      actions.exit(130);
      return;
    }
    actions.warn(CANCEL_NOTICE);
    controller.abort();
  };
}
