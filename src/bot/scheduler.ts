import cron, { type ScheduledTask } from 'node-cron';
import { ConfigurationError } from '../backtest/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scheduler');

export const SCHEDULER_TIMEZONE = 'America/New_York';

interface ScheduledJob {
  name: string;
  schedule: string;
  task: ScheduledTask;
}

export class Scheduler {
  private jobs: ScheduledJob[] = [];

  /**
   * Schedules `handler` in New York time. A failing run is logged and the
   * schedule continues; a run that fires while the previous one is still
   * going is skipped.
   */
  registerJob(name: string, cronExpression: string, handler: () => void | Promise<void>): void {
    if (!cron.validate(cronExpression)) {
      throw new ConfigurationError(`Invalid cron expression for ${name}: ${cronExpression}`, {
        name,
        cronExpression,
      });
    }
    if (this.jobs.some((j) => j.name === name)) {
      throw new ConfigurationError(`Job already registered: ${name}`, { name });
    }

    let running = false;

    const wrappedHandler = async () => {
      if (running) {
        log.warn({ job: name }, 'Previous run still in progress, skipping');
        return;
      }
      running = true;
      try {
        log.debug({ job: name }, 'Running scheduled job');
        await handler();
      } catch (err) {
        log.error({ job: name, err }, 'Scheduled job failed');
      } finally {
        running = false;
      }
    };

    const task = cron.schedule(cronExpression, wrappedHandler, {
      scheduled: true,
      timezone: SCHEDULER_TIMEZONE,
    });

    this.jobs.push({ name, schedule: cronExpression, task });
    log.info({ name, schedule: cronExpression }, 'Job registered');
  }

  stop(): void {
    for (const job of this.jobs) {
      job.task.stop();
    }
    log.info({ jobCount: this.jobs.length }, 'All scheduled jobs stopped');
    this.jobs = [];
  }

  getScheduledJobs(): Array<{ name: string; schedule: string }> {
    return this.jobs.map((j) => ({ name: j.name, schedule: j.schedule }));
  }
}

/** Convert an ET time string like "16:30" to a cron expression on weekdays. */
export function timeToCron(time: string, daysOfWeek = '1-5'): string {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  const hours = match ? Number(match[1]) : Number.NaN;
  const mins = match ? Number(match[2]) : Number.NaN;
  if (!(hours >= 0 && hours <= 23 && mins >= 0 && mins <= 59)) {
    throw new ConfigurationError(`Invalid time of day: ${time}`, { time });
  }
  return `${mins} ${hours} * * ${daysOfWeek}`;
}
