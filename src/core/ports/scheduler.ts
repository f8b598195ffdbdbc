/**
 * Timer trigger port: runs one task on a fixed interval.
 *
 * A tick that fires while the previous run is still in flight is skipped,
 * so at most one run executes at a time.
 */

export type ScheduledTask = () => Promise<void>;

export interface Scheduler {
  readonly name: string;
  /** True between start() and stop() */
  readonly running: boolean;
  start(): void;
  /** Clear the timer; resolves once any in-flight run has settled */
  stop(): Promise<void>;
  /** Run the task once now. Resolves to false when a run was already in flight. */
  runNow(): Promise<boolean>;
}
