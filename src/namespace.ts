import { extendsPlugin, Plugin } from "./plugin.js";
import type { LegacyPluginClass, ModernPluginClass, PluginClass, PluginClassDescriptor } from "./types.js";

/**
 * Whether an exported value is a class declared with `class` syntax. Plain functions are not registered.
 */
export function isPluginClass(value: unknown): value is PluginClass {
  return (
    typeof value === "function" &&
    typeof value.prototype === "object" &&
    value !== Plugin &&
    Function.prototype.toString.call(value).startsWith("class")
  );
}

/**
 * Whether a class extends `Plugin` and so takes a single options object.
 */
export function isModernPluginClass(value: PluginClass): value is ModernPluginClass {
  return extendsPlugin(value);
}

/**
 * Registry of plugin classes keyed by constant name, standing in for the `Guard` module.
 *
 * Invariant: the construction convention of a class is fixed when it is defined.
 */
export class GuardNamespace {
  private readonly classes = new Map<string, PluginClassDescriptor>();

  /**
   * Register a class, detecting the convention from whether it extends `Plugin`.
   */
  define(constantName: string, ctor: PluginClass): PluginClassDescriptor {
    if (isModernPluginClass(ctor)) {
      return this.defineModern(constantName, ctor);
    }
    return this.defineLegacy(constantName, ctor);
  }

  /**
   * Register a class constructed with a single options object, whatever its ancestry.
   */
  defineModern(constantName: string, ctor: ModernPluginClass): PluginClassDescriptor {
    return this.store({ constantName, usesModernConstructor: true, ctor });
  }

  defineLegacy(constantName: string, ctor: LegacyPluginClass): PluginClassDescriptor {
    return this.store({ constantName, usesModernConstructor: false, ctor });
  }

  has(constantName: string): boolean {
    return this.classes.has(constantName);
  }

  get(constantName: string): PluginClassDescriptor | undefined {
    return this.classes.get(constantName);
  }

  remove(constantName: string): boolean {
    return this.classes.delete(constantName);
  }

  constants(): string[] {
    return [...this.classes.keys()];
  }

  /**
   * Find the first candidate registered under its exact name; failing that, the first
   * candidate matching a registered name case-insensitively.
   *
   * @param candidates - Class names in precedence order.
   * @returns Matching descriptor or undefined.
   */
  lookup(candidates: readonly string[]): PluginClassDescriptor | undefined {
    for (const candidate of candidates) {
      const exact = this.classes.get(candidate);
      if (exact) {
        return exact;
      }
    }
    for (const candidate of candidates) {
      const lowered = candidate.toLowerCase();
      for (const [constantName, descriptor] of this.classes) {
        if (constantName.toLowerCase() === lowered) {
          return descriptor;
        }
      }
    }
    return undefined;
  }

  private store(descriptor: PluginClassDescriptor): PluginClassDescriptor {
    this.classes.set(descriptor.constantName, descriptor);
    return descriptor;
  }
}

/**
 * Process-wide namespace that plugin modules register into.
 */
export const guardNamespace = new GuardNamespace();
