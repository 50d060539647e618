import cron, { type ScheduledTask } from 'node-cron';
import { defaultLogger, describeError, type CurationLogger } from '../logging';
import type { CurationResult } from './types';

export type CronTask = Pick<ScheduledTask, 'start' | 'stop'>;

type ScheduleFn = (
  expression: string,
  callback: () => void,
) => CronTask;

interface CurationSchedulerOptions {
  enableInternalCron: boolean;
  cronExpression: string;
  jobRunner: () => Promise<CurationResult>;
  scheduleFn?: ScheduleFn;
  logger?: CurationLogger;
}

export class CurationScheduler {
  private readonly enableInternalCron: boolean;

  private readonly cronExpression: string;

  private readonly jobRunner: () => Promise<CurationResult>;

  private readonly scheduleFn: ScheduleFn;

  private readonly logger: CurationLogger;

  private task: CronTask | null = null;

  private running = false;

  constructor(options: CurationSchedulerOptions) {
    this.enableInternalCron = options.enableInternalCron;
    this.cronExpression = options.cronExpression;
    this.jobRunner = options.jobRunner;
    this.scheduleFn = options.scheduleFn ?? cron.schedule;
    this.logger = options.logger ?? defaultLogger;
  }

  start(): CronTask | null {
    if (!this.enableInternalCron) {
      return null;
    }
    if (this.task) {
      return this.task;
    }
    this.task = this.scheduleFn(this.cronExpression, () => {
      if (this.running) {
        this.logger.warn('curation.run.overlap', { cron: this.cronExpression });
        return;
      }
      this.handleTrigger().catch(() => undefined);
    });
    this.task.start();
    return this.task;
  }

  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = null;
  }

  async runOnce(): Promise<CurationResult> {
    return this.handleTrigger();
  }

  private async handleTrigger(): Promise<CurationResult> {
    this.running = true;
    try {
      const result = await this.jobRunner();
      this.logger.info('curation.run.complete', { ...result.stats });
      return result;
    } catch (error) {
      this.logger.error('curation.run.failed', describeError(error));
      throw error;
    } finally {
      this.running = false;
    }
  }
}
