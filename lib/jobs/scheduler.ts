export type JobTrigger =
  | { type: "daily"; utcHour: number; utcMinute?: number }
  | { type: "interval"; everyMs: number };

export interface JobDefinition<T = unknown> {
  name: string;
  trigger: JobTrigger;
  handler: (context: { triggeredBy: string }) => Promise<T>;
}

export type TriggerResult<T = unknown> =
  | { status: "completed"; name: string; result: T }
  | { status: "skipped"; name: string; reason: "already_running" }
  | { status: "failed"; name: string; error: string };

export interface TimerApi {
  /** Schedules the callback once and returns its cancel function. */
  setTimer(callback: () => void, delayMs: number): () => void;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const realTimers: TimerApi = {
  setTimer: (callback, delayMs) => {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  }
};

/** Milliseconds from `nowMs` until the next occurrence of the trigger. */
export function msUntilNextRun(trigger: JobTrigger, nowMs: number): number {
  if (trigger.type === "interval") {
    return trigger.everyMs;
  }

  const now = new Date(nowMs);
  const next = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate(),
    trigger.utcHour,
    trigger.utcMinute ?? 0,
    0,
    0
  );

  return next > nowMs ? next - nowMs : next + DAY_MS - nowMs;
}

/**
 * Holds job definitions with a run-lock per job. A trigger that arrives while
 * the same job is running is skipped, never queued. Instances share nothing,
 * so several schedulers can coexist.
 */
export class Scheduler {
  private readonly jobs = new Map<string, JobDefinition>();
  private readonly running = new Set<string>();
  private readonly timers = new Map<string, () => void>();
  private readonly inFlight = new Set<Promise<unknown>>();
  private started = false;

  constructor(
    private readonly options: {
      now?: () => number;
      timers?: TimerApi;
    } = {}
  ) {}

  register<T>(definition: JobDefinition<T>): void {
    if (this.jobs.has(definition.name)) {
      throw new Error(`Job "${definition.name}" is already registered`);
    }

    this.jobs.set(definition.name, definition);
    if (this.started) {
      this.arm(definition.name);
    }
  }

  jobNames(): string[] {
    return [...this.jobs.keys()];
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  async trigger(name: string, triggeredBy = "manual"): Promise<TriggerResult> {
    const job = this.jobs.get(name);
    if (!job) {
      throw new Error(`Unknown job "${name}"`);
    }

    if (this.running.has(name)) {
      console.warn(`[scheduler] ${name} is already running; trigger skipped`, { triggeredBy });
      return { status: "skipped", name, reason: "already_running" };
    }

    this.running.add(name);
    const startedAt = this.now();
    try {
      const result = await job.handler({ triggeredBy });
      console.log(`[scheduler] ${name} completed in ${Math.round((this.now() - startedAt) / 1000)}s`);
      return { status: "completed", name, result };
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown";
      console.error(`[scheduler] ${name} failed`, { error: message });
      return { status: "failed", name, error: message };
    } finally {
      this.running.delete(name);
    }
  }

  start(): void {
    if (this.started) {
      return;
    }

    this.started = true;
    for (const name of this.jobs.keys()) {
      this.arm(name);
    }
  }

  /** Disarms timers and waits for runs that timers already started. */
  async stop(): Promise<void> {
    this.started = false;
    for (const cancel of this.timers.values()) {
      cancel();
    }
    this.timers.clear();
    await Promise.all([...this.inFlight]);
  }

  private now(): number {
    return (this.options.now ?? Date.now)();
  }

  private timerApi(): TimerApi {
    return this.options.timers ?? realTimers;
  }

  private arm(name: string): void {
    const job = this.jobs.get(name);
    if (!job) {
      return;
    }

    const delayMs = msUntilNextRun(job.trigger, this.now());
    const cancel = this.timerApi().setTimer(() => {
      this.timers.delete(name);
      const run = this.trigger(name, "schedule").finally(() => {
        this.inFlight.delete(run);
        if (this.started) {
          this.arm(name);
        }
      });
      this.inFlight.add(run);
    }, delayMs);

    this.timers.set(name, cancel);
  }
}

export function createScheduler(options: { now?: () => number; timers?: TimerApi } = {}): Scheduler {
  return new Scheduler(options);
}
