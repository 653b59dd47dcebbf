import { MAX_TIMER_DELAY_MS, timerDelay } from '../../shared/async.js';
import { JobCancelledError, JobTimeoutError, type FlywheelError } from '../../shared/errors.js';

/**
 * Cancellation and deadline for one job. Every in-flight task shares `signal`;
 * `interrupted` rejects as soon as the job is cancelled or runs out of time.
 */
export class JobController {
  private readonly abortController = new AbortController();
  private deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  private rejectInterrupted: ((reason: FlywheelError) => void) | undefined;
  private disposed = false;

  readonly interrupted: Promise<never>;

  constructor() {
    this.interrupted = new Promise<never>((_, reject) => {
      this.rejectInterrupted = reject;
    });
    // Observed through Promise.race; this keeps an unraced controller quiet.
    this.interrupted.catch(() => undefined);
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /** Deadlines past `MAX_TIMER_DELAY_MS` are waited out in several timers. */
  armDeadline(ms: number): void {
    clearTimeout(this.deadlineTimer);
    const expiresAt = Date.now() + ms;
    const arm = (): void => {
      const remaining = expiresAt - Date.now();
      if (remaining > MAX_TIMER_DELAY_MS) {
        this.deadlineTimer = setTimeout(arm, MAX_TIMER_DELAY_MS);
        return;
      }
      this.deadlineTimer = setTimeout(() => {
        this.interrupt(new JobTimeoutError(`Job exceeded its ${ms}ms deadline`));
      }, timerDelay(remaining));
    };
    arm();
  }

  cancel(reason = 'Job cancelled'): void {
    this.interrupt(new JobCancelledError(reason));
  }

  /** Aborts in-flight work. Backend jobs already submitted keep running. */
  interrupt(reason: FlywheelError): void {
    if (this.disposed || this.isCancelled) return;
    this.abortController.abort(reason);
    this.rejectInterrupted?.(reason);
  }

  dispose(): void {
    this.disposed = true;
    clearTimeout(this.deadlineTimer);
  }
}
