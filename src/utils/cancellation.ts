import type { Logger } from "./logger.ts";

export type StopSignal = "SIGINT" | "SIGTERM";

const SIGNAL_REASON: Record<StopSignal, string> = {
  SIGINT: "Interrupted",
  SIGTERM: "Terminated",
};

const SIGNAL_EXIT_CODE: Record<StopSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export interface RunCancellation {
  readonly signal: AbortSignal;
  /** Ask every stage to stop after its current unit of work. */
  abort(reason: string): void;
  /** First signal aborts the run; a second one exits immediately. */
  onSignal(name: StopSignal): void;
}

export function createRunCancellation(
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code)
): RunCancellation {
  const controller = new AbortController();
  let signalsSeen = 0;

  function abort(reason: string): void {
    if (controller.signal.aborted) return;
    logger.warn(`${reason}: finishing current step and saving partial results (signal again to force exit)`);
    controller.abort(reason);
  }

  return {
    signal: controller.signal,
    abort,
    onSignal(name) {
      signalsSeen++;
      if (signalsSeen > 1) {
        logger.warn(`${name} received again, exiting without saving`);
        exit(SIGNAL_EXIT_CODE[name]);
        return;
      }
      abort(SIGNAL_REASON[name]);
    },
  };
}
