/**
 * Supervised periodic background tasks.
 *
 * Each task owns an AbortController. A run never overlaps the previous one,
 * a throwing run is logged and the task keeps its schedule, and `stop()`
 * resolves once any in-flight run has finished.
 */

export type TaskRun = (signal: AbortSignal) => void | Promise<void>;

export interface PeriodicTaskOptions {
  /** Run once right away instead of waiting one interval */
  runImmediately?: boolean;
  /** Parent cancellation; aborting it stops the task */
  signal?: AbortSignal;
}

export interface TaskHandle {
  readonly name: string;
  readonly signal: AbortSignal;
  isRunning(): boolean;
  /** Cancel and wait for the in-flight run */
  stop(): Promise<void>;
}

/**
 * Start a task that calls `run` every `intervalMs`.
 */
export function startPeriodicTask(
  name: string,
  intervalMs: number,
  run: TaskRun,
  options: PeriodicTaskOptions = {}
): TaskHandle {
  const controller = new AbortController();
  let inFlight: Promise<void> | null = null;

  const tick = (): void => {
    if (controller.signal.aborted || inFlight) {
      return;
    }
    inFlight = (async () => {
      try {
        await run(controller.signal);
      } catch (err) {
        console.error(`[task:${name}] run failed:`, err);
      }
    })().finally(() => {
      inFlight = null;
    });
  };

  const timer = setInterval(tick, intervalMs);

  const halt = (): void => {
    if (controller.signal.aborted) {
      return;
    }
    controller.abort();
    clearInterval(timer);
  };

  if (options.signal) {
    if (options.signal.aborted) {
      halt();
    } else {
      options.signal.addEventListener("abort", halt, { once: true });
    }
  }

  if (options.runImmediately) {
    tick();
  }

  return {
    name,
    signal: controller.signal,
    isRunning: () => !controller.signal.aborted,
    stop: async () => {
      halt();
      if (inFlight) {
        await inFlight;
      }
    },
  };
}

/**
 * Named set of periodic tasks with a single shutdown point.
 */
export class TaskSupervisor {
  private tasks = new Map<string, TaskHandle>();

  constructor(private readonly tag = "tasks") {}

  /** Start a task; an already-running task of the same name is kept */
  spawn(
    name: string,
    intervalMs: number,
    run: TaskRun,
    options: PeriodicTaskOptions = {}
  ): TaskHandle {
    const existing = this.tasks.get(name);
    if (existing?.isRunning()) {
      return existing;
    }

    const handle = startPeriodicTask(name, intervalMs, run, options);
    this.tasks.set(name, handle);
    console.log(`[${this.tag}] started ${name} (${intervalMs}ms interval)`);
    return handle;
  }

  async stop(name: string): Promise<void> {
    const handle = this.tasks.get(name);
    if (!handle) {
      return;
    }
    this.tasks.delete(name);
    await handle.stop();
    console.log(`[${this.tag}] stopped ${name}`);
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.tasks.keys()].map((name) => this.stop(name)));
  }

  /** Names of running tasks (for status and tests) */
  activeTasks(): string[] {
    return [...this.tasks.entries()]
      .filter(([, handle]) => handle.isRunning())
      .map(([name]) => name);
  }
}
