import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { DigestRunReport } from "./digest";

export type DigestScheduler = {
  readonly stop: () => void;
};

/**
 * Runs one digest for the window ending at `now`.
 */
export type RunCycleFn = (now: Date) => Promise<DigestRunReport>;

/**
 * Starts a cron task that runs a digest cycle on each tick.
 * A tick that fires while the previous cycle is still running is skipped,
 * so two digests never run against the channel at once.
 *
 * @param expression - Cron expression, e.g. `0 9 * * MON`
 * @param runCycle - Runs one cycle for the window ending at the tick time
 * @param logger - Logger instance
 */
export function createDigestScheduler(
  expression: string,
  runCycle: RunCycleFn,
  logger: Logger,
): DigestScheduler {
  let running = false;

  const task: ScheduledTask = cron.schedule(expression, async () => {
    if (running) {
      logger.warn("previous digest cycle still running, skipping tick");
      return;
    }

    running = true;
    try {
      const report = await runCycle(new Date());
      if (report.success) {
        logger.info({ steps: report.steps }, "scheduled digest cycle succeeded");
      } else {
        logger.error(
          { steps: report.steps, error: report.error },
          "scheduled digest cycle failed",
        );
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "digest cycle failed unexpectedly");
    } finally {
      running = false;
    }
  });

  return {
    stop: () => {
      void task.stop();
    },
  };
}
