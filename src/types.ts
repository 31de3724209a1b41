/**
 * Installed package as reported by the host package system.
 *
 * @property name - Declared package name.
 * @property version - Declared version, when the manifest has one.
 * @property path - Install directory; absent for packages without an on-disk location.
 */
export interface InstalledPackage {
  readonly name: string;
  readonly version?: string;
  readonly path?: string;
}

/**
 * Read-only view of the packages installed for a project.
 *
 * Invariant: `findByName` rejects with `PackageNotFoundError` rather than resolving to nothing.
 */
export interface PackageRegistry {
  findAll(): Promise<readonly InstalledPackage[]>;
  findByName(name: string): Promise<InstalledPackage>;
}

/**
 * User-visible diagnostics. Implementations never throw.
 */
export interface Ui {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Narrow view of the Guardfile evaluator consumed by the integrator.
 */
export interface GuardfileEvaluator {
  guardfileInclude(name: string): Promise<boolean>;
  evaluate(): Promise<void>;
}

/**
 * Loads the code unit behind a canonical key such as `guard/rspec`.
 *
 * @returns `true` when the unit was loaded by this call, `false` when it had been loaded before.
 * @throws PluginLoadError when no unit exists for the key.
 */
export interface ModuleLoader {
  require(key: string): Promise<boolean>;
}

/**
 * A path pattern a plugin reacts to, with an optional transform of matched paths.
 */
export interface Watcher {
  readonly pattern: string | RegExp;
  readonly action?: (match: RegExpMatchArray) => string | readonly string[] | undefined;
}

export type CallbackListener = (plugin: object, event: string, ...args: unknown[]) => void;

export interface PluginCallback {
  readonly events: readonly string[];
  readonly listener: CallbackListener;
}

/**
 * Options handed to a plugin at construction time.
 */
export interface PluginOptions {
  readonly watchers?: readonly Watcher[];
  readonly group?: string;
  readonly callbacks?: readonly PluginCallback[];
  readonly [key: string]: unknown;
}

export type LegacyPluginOptions = Readonly<Record<string, unknown>>;

/**
 * Class following the shared contract: constructed with a single options object.
 */
export type ModernPluginClass = new (options: PluginOptions) => object;

/**
 * Class predating the shared contract: constructed with watchers and the remaining options.
 */
export type LegacyPluginClass = new (watchers: readonly Watcher[], options: LegacyPluginOptions) => object;

export type PluginClass = ModernPluginClass | LegacyPluginClass;

/**
 * Class registered under the `Guard` namespace, tagged with its construction convention.
 *
 * @property constantName - Name the class is registered under, e.g. `DashedClassName`.
 */
export type PluginClassDescriptor =
  | { readonly constantName: string; readonly usesModernConstructor: true; readonly ctor: ModernPluginClass }
  | { readonly constantName: string; readonly usesModernConstructor: false; readonly ctor: LegacyPluginClass };

/**
 * Outcome of a class resolution before diagnostics are rendered.
 */
export type ResolutionResult =
  | { readonly kind: "resolved"; readonly descriptor: PluginClassDescriptor }
  | { readonly kind: "not-found"; readonly diagnostics: readonly string[]; readonly cause: Error };

export interface PluginClassOptions {
  readonly failGracefully?: boolean;
}
