export type CancelTask = () => void;

export interface Scheduler {
  scheduleOnce(delayMs: number, task: () => void): CancelTask;
  scheduleRepeating(intervalMs: number, task: () => void): CancelTask;
}

export const timerScheduler: Scheduler = {
  scheduleOnce(delayMs, task) {
    const timeout = setTimeout(task, delayMs);
    return () => clearTimeout(timeout);
  },
  scheduleRepeating(intervalMs, task) {
    const interval = setInterval(task, intervalMs);
    return () => clearInterval(interval);
  }
};

interface ScheduledTask {
  id: number;
  dueAt: number;
  intervalMs: number | null;
  task: () => void;
}

/**
 * Virtual-time scheduler. Nothing runs until `advanceBy` moves the clock;
 * due tasks then fire in due-time order, ties in scheduling order.
 */
export class ManualScheduler implements Scheduler {
  private readonly tasks = new Map<number, ScheduledTask>();
  private nextId = 1;
  private currentTime = 0;

  get now(): number {
    return this.currentTime;
  }

  get pendingCount(): number {
    return this.tasks.size;
  }

  scheduleOnce(delayMs: number, task: () => void): CancelTask {
    return this.add(delayMs, null, task);
  }

  scheduleRepeating(intervalMs: number, task: () => void): CancelTask {
    if (intervalMs <= 0) {
      throw new Error(`Repeating interval must be positive, got ${intervalMs}`);
    }
    return this.add(intervalMs, intervalMs, task);
  }

  advanceBy(ms: number): void {
    const target = this.currentTime + ms;

    for (let next = this.nextDue(target); next; next = this.nextDue(target)) {
      this.currentTime = next.dueAt;
      if (next.intervalMs === null) {
        this.tasks.delete(next.id);
      } else {
        next.dueAt += next.intervalMs;
      }
      next.task();
    }

    this.currentTime = target;
  }

  private add(delayMs: number, intervalMs: number | null, task: () => void): CancelTask {
    const id = this.nextId;
    this.nextId += 1;
    this.tasks.set(id, { id, dueAt: this.currentTime + Math.max(delayMs, 0), intervalMs, task });
    return () => {
      this.tasks.delete(id);
    };
  }

  private nextDue(target: number): ScheduledTask | undefined {
    let earliest: ScheduledTask | undefined;
    for (const candidate of this.tasks.values()) {
      if (candidate.dueAt > target) {
        continue;
      }
      if (!earliest || candidate.dueAt < earliest.dueAt || (candidate.dueAt === earliest.dueAt && candidate.id < earliest.id)) {
        earliest = candidate;
      }
    }
    return earliest;
  }
}
