import type { TaskExecutor, TaskFunction } from './executor.js';

/**
 * Maps task names to executors. Lookups accept `-` and `_` interchangeably,
 * so `hotel-listings` finds a task registered as `hotel_listings`.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskExecutor>();

  register(name: string, executor: TaskExecutor | TaskFunction): this {
    if (!/^[A-Za-z0-9][A-Za-z0-9_-]*$/.test(name)) {
      throw new Error(`Invalid task name '${name}'`);
    }
    if (this.tasks.has(name)) throw new Error(`Task '${name}' is already registered`);
    this.tasks.set(name, typeof executor === 'function' ? { execute: executor } : executor);
    return this;
  }

  /** The registered spelling of `name`, if any variant is registered. */
  resolveName(name: string): string | undefined {
    const variants = [name, name.replace(/_/g, '-'), name.replace(/-/g, '_')];
    return variants.find((v) => this.tasks.has(v));
  }

  get(name: string): TaskExecutor | undefined {
    const resolved = this.resolveName(name);
    return resolved === undefined ? undefined : this.tasks.get(resolved);
  }

  has(name: string): boolean {
    return this.resolveName(name) !== undefined;
  }

  names(): string[] {
    return [...this.tasks.keys()].sort();
  }
}
