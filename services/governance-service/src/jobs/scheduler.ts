import type { Logger } from "pino";
import { logger as defaultLogger } from "../logger";

export type JobRun = (signal: AbortSignal) => Promise<unknown>;

export type IntervalJob = {
  name: string;
  start: () => void;
  /** Runs one tick immediately; resolves false when a run is already in flight. */
  tick: () => Promise<boolean>;
  /** Clears the timer, aborts the in-flight run and waits for it to settle. */
  stop: () => Promise<void>;
  isRunning: () => boolean;
};

export function createIntervalJob(options: {
  name: string;
  intervalMs: number;
  run: JobRun;
  logger?: Logger;
}): IntervalJob {
  const log = options.logger ?? defaultLogger;
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;
  let controller: AbortController | null = null;

  const tick = async (): Promise<boolean> => {
    if (inFlight) {
      log.debug({ job: options.name, traceId: "system" }, "Previous run still in flight; skipping tick");
      return false;
    }
    const current = new AbortController();
    controller = current;
    inFlight = (async () => {
      const startedAt = Date.now();
      try {
        const result = await options.run(current.signal);
        log.info(
          { job: options.name, durationMs: Date.now() - startedAt, result, traceId: "system" },
          "Scheduled job finished"
        );
      } catch (error) {
        log.error({ error, job: options.name, traceId: "system" }, "Scheduled job failed");
      }
    })();
    try {
      await inFlight;
    } finally {
      inFlight = null;
      controller = null;
    }
    return true;
  };

  return {
    name: options.name,
    start: () => {
      if (timer) {
        return;
      }
      timer = setInterval(() => {
        void tick();
      }, options.intervalMs);
      timer.unref();
      log.info({ job: options.name, intervalMs: options.intervalMs, traceId: "system" }, "Scheduled job started");
    },
    tick,
    stop: async () => {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      controller?.abort();
      if (inFlight) {
        await inFlight;
      }
    },
    isRunning: () => inFlight !== null
  };
}
