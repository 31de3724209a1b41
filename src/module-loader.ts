import fs from "fs-extra";
import { join } from "path";
import { pathToFileURL } from "url";
import sanitize from "sanitize-filename";
import { GUARD } from "./config.js";
import { PluginLoadError } from "./errors.js";
import { debug } from "./logger.js";
import { isPluginClass, type GuardNamespace } from "./namespace.js";
import type { ModuleLoader, PackageRegistry } from "./types.js";

type RegisterFn = (namespace: GuardNamespace) => unknown;

function isRecord(value: unknown): value is { readonly [key: string]: unknown } {
  return typeof value === "object" && value !== null;
}

function isRegisterFn(value: unknown): value is RegisterFn {
  return typeof value === "function";
}

/**
 * Loads plugin modules from `<loadPath>/guard/<name>.{js,mjs,cjs}` and registers their exported
 * classes into a namespace. Each key is imported at most once.
 */
export class PluginModuleLoader implements ModuleLoader {
  private readonly loaded = new Set<string>();

  constructor(
    private readonly namespace: GuardNamespace,
    private readonly loadPaths: readonly string[]
  ) {}

  /**
   * Build a loader searching the project's own `lib` directory, then every installed package's `lib`.
   *
   * @param namespace - Namespace receiving loaded classes.
   * @param packages - Installed packages to derive load paths from.
   * @param projectRoot - Project directory.
   */
  static async forProject(
    namespace: GuardNamespace,
    packages: PackageRegistry,
    projectRoot: string
  ): Promise<PluginModuleLoader> {
    const installed = await packages.findAll();
    const loadPaths = [join(projectRoot, "lib")];
    for (const pkg of installed) {
      if (pkg.path) {
        loadPaths.push(join(pkg.path, "lib"));
      }
    }
    return new PluginModuleLoader(namespace, loadPaths);
  }

  async require(key: string): Promise<boolean> {
    if (this.loaded.has(key)) {
      return false;
    }
    const file = await this.locate(key);
    if (!file) {
      throw new PluginLoadError(key);
    }

    let mod: unknown;
    try {
      mod = await import(pathToFileURL(file).href);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PluginLoadError(key, `failed to import ${file}: ${reason}`, { cause: error });
    }
    this.loaded.add(key);
    debug(`Loaded ${key} from ${file}`);
    await this.register(mod);
    return true;
  }

  private async locate(key: string): Promise<string | undefined> {
    const segments = key.split("/");
    if (segments[0] !== GUARD.NAMESPACE || segments.some(segment => segment === "" || sanitize(segment) !== segment)) {
      throw new PluginLoadError(key, `invalid plugin key -- ${key}`);
    }
    for (const loadPath of this.loadPaths) {
      for (const extension of GUARD.MODULE_EXTENSIONS) {
        const candidate = `${join(loadPath, ...segments)}${extension}`;
        if (await fs.pathExists(candidate)) {
          return candidate;
        }
      }
    }
    return undefined;
  }

  private async register(mod: unknown, called = new Set<RegisterFn>()): Promise<void> {
    if (!isRecord(mod)) {
      return;
    }
    for (const [exportName, value] of Object.entries(mod)) {
      if (exportName === "register" && isRegisterFn(value)) {
        if (!called.has(value)) {
          called.add(value);
          await value(this.namespace);
        }
      } else if (exportName === "default" && isPluginClass(value)) {
        this.namespace.define(value.name, value);
      } else if (exportName === "default" && isRecord(value)) {
        // CommonJS modules surface `module.exports` as the default export.
        await this.register(value, called);
      } else if (isPluginClass(value)) {
        this.namespace.define(exportName, value);
      }
    }
  }
}
