import type { PluginCallback, PluginOptions, Watcher } from "./types.js";

/**
 * Shared contract for watch-triggered plugins.
 *
 * Subclasses are constructed with a single options object; the task methods are optional
 * and invoked by the surrounding runner when present.
 */
export abstract class Plugin {
  readonly options: Readonly<Record<string, unknown>>;
  readonly watchers: readonly Watcher[];
  readonly group: string;
  readonly callbacks: readonly PluginCallback[];

  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
  reload?(): Promise<void> | void;
  runAll?(): Promise<void> | void;
  runOnModifications?(paths: readonly string[]): Promise<void> | void;
  runOnAdditions?(paths: readonly string[]): Promise<void> | void;
  runOnRemovals?(paths: readonly string[]): Promise<void> | void;

  constructor(options: PluginOptions = {}) {
    const { watchers = [], group = "default", callbacks = [], ...rest } = options;
    this.watchers = watchers;
    this.group = group;
    this.callbacks = callbacks;
    this.options = rest;
  }

  /**
   * Class name as shown to users, e.g. `RSpec`.
   */
  get title(): string {
    return this.constructor.name;
  }

  /**
   * Lowercased title, the name used in the Guardfile.
   */
  get name(): string {
    return this.title.toLowerCase();
  }

  /**
   * Notify callbacks listening to `event`, conventionally `<task>_begin` or `<task>_end`.
   *
   * @param event - Event name.
   * @param args - Extra arguments forwarded to each listener.
   * @returns Number of listeners notified.
   */
  hook(event: string, ...args: unknown[]): number {
    let notified = 0;
    for (const callback of this.callbacks) {
      if (callback.events.includes(event)) {
        callback.listener(this, event, ...args);
        notified += 1;
      }
    }
    return notified;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Whether `ctor` extends the shared base class.
 */
export function extendsPlugin(ctor: { readonly prototype: unknown }): boolean {
  return ctor.prototype instanceof Plugin;
}
