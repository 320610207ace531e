/**
 * @file packages/orchestrator/src/application/services/session-sweeper.ts
 * @description Scheduled removal of expired sessions.
 */

import { inject, singleton } from 'tsyringe';
import cron, { type ScheduledTask } from 'node-cron';
import { SessionManager } from './session-manager.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger } from '../../logger.js';
import { errorMessage } from '../../domain/errors/app-error.js';

@singleton()
export class SessionSweeper {
  private task: ScheduledTask | null = null;
  private running = false;
  private readonly schedule: string;

  constructor(
    @inject(SessionManager) private sessions: Pick<SessionManager, 'sweep'>,
    @inject(ConfigService) config: ConfigService,
    @inject(Logger) private logger: Logger,
  ) {
    this.schedule = config.get('session').sweepSchedule;
  }

  get isScheduled(): boolean {
    return this.task !== null;
  }

  /**
   * Schedules the sweep. Calling it twice keeps the first schedule.
   */
  start(): void {
    if (this.task) return;
    if (!cron.validate(this.schedule)) {
      throw new Error(`Invalid session sweep schedule: "${this.schedule}"`);
    }
    this.logger.debug(`[SessionSweeper] Scheduling sweep: ${this.schedule}`);
    this.task = cron.schedule(this.schedule, () => {
      void this.runNow();
    });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  /**
   * Runs one sweep unless one is already in flight.
   * @returns Sessions deleted, or 0 when skipped or failed.
   */
  async runNow(): Promise<number> {
    if (this.running) {
      this.logger.debug('[SessionSweeper] Already running, skipping trigger.');
      return 0;
    }
    this.running = true;
    try {
      return await this.sessions.sweep();
    } catch (err) {
      this.logger.error('[SessionSweeper] Sweep failed', {
        event: 'session_sweep_error',
        error: errorMessage(err),
      });
      return 0;
    } finally {
      this.running = false;
    }
  }
}
