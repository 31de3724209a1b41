import fs from "fs-extra";
import { join } from "path";
import { GUARD } from "./config.js";
import type { PluginContext } from "./context.js";
import { PackageNotFoundError, PluginClassNotFoundError, PluginLoadError } from "./errors.js";
import { writeGuardfileWithTemplate } from "./guardfile/append.js";
import type {
  PackageRegistry,
  PluginClass,
  PluginClassDescriptor,
  PluginClassOptions,
  PluginOptions,
  ResolutionResult
} from "./types.js";
import { classNameCandidates, constantName, pluginKey, pluginPackageName, pluginShortName } from "./utils/naming.js";

async function hasEmbeddedPlugin(packagePath: string, packageName: string): Promise<boolean> {
  for (const extension of GUARD.MODULE_EXTENSIONS) {
    if (await fs.pathExists(join(packagePath, "lib", GUARD.NAMESPACE, `${packageName}${extension}`))) {
      return true;
    }
  }
  return false;
}

/**
 * Resolves, instantiates and scaffolds a single plugin identified by its short name.
 */
export class PluginUtil {
  readonly rawName: string | symbol;
  readonly name: string;

  /**
   * @param rawName - `"rspec"`, `"guard-rspec"` or a symbol such as `Symbol("rspec")`.
   * @param context - Collaborators used for lookup, loading and diagnostics.
   */
  constructor(rawName: string | symbol, private readonly context: PluginContext) {
    this.rawName = rawName;
    this.name = pluginShortName(rawName);
  }

  /**
   * Short names of every installed plugin: packages named `guard-<name>`, plus packages
   * embedding `lib/guard/<package>.js`.
   *
   * @param packages - Installed packages.
   * @returns Deduplicated short names.
   */
  static async pluginNames(packages: PackageRegistry): Promise<Set<string>> {
    const names = new Set<string>();
    for (const pkg of await packages.findAll()) {
      if (pkg.name.startsWith(GUARD.PREFIX)) {
        names.add(pluginShortName(pkg.name));
      } else if (pkg.path && (await hasEmbeddedPlugin(pkg.path, pkg.name))) {
        names.add(pkg.name);
      }
    }
    return names;
  }

  /**
   * Locate the plugin class, loading `guard/<name>` when the namespace does not hold it yet.
   */
  async resolve(): Promise<ResolutionResult> {
    const { namespace, loader } = this.context;
    const candidates = classNameCandidates(this.name);

    const defined = namespace.lookup(candidates);
    if (defined) {
      return { kind: "resolved", descriptor: defined };
    }

    const key = pluginKey(this.name);
    try {
      await loader.require(key);
    } catch (error) {
      if (error instanceof PluginLoadError) {
        return this.notFound(error, candidates);
      }
      throw error;
    }

    const loaded = namespace.lookup(candidates);
    if (loaded) {
      return { kind: "resolved", descriptor: loaded };
    }
    return this.notFound(new PluginClassNotFoundError(constantName(this.name), candidates), candidates);
  }

  /**
   * Resolve the plugin class.
   *
   * Invariant: never throws for a missing module or class. Unless `failGracefully` is set,
   * three error lines are reported before returning undefined.
   */
  async pluginClass(options: PluginClassOptions = {}): Promise<PluginClass | undefined> {
    return (await this.pluginDescriptor(options))?.ctor;
  }

  /**
   * Construct the plugin. Classes extending `Plugin` receive `options` whole; legacy classes
   * receive `(watchers, remainingOptions)`.
   *
   * @returns The new instance, or undefined when the class could not be resolved.
   */
  async initializePlugin(options: PluginOptions): Promise<object | undefined> {
    const descriptor = await this.pluginDescriptor();
    if (!descriptor) {
      return undefined;
    }
    if (descriptor.usesModernConstructor) {
      return new descriptor.ctor(options);
    }
    const { watchers = [], ...rest } = options;
    return new descriptor.ctor(watchers, rest);
  }

  /**
   * Install directory of the `guard-<name>` package.
   *
   * @throws PackageNotFoundError when the package is not installed.
   */
  async pluginLocation(): Promise<string> {
    const packageName = pluginPackageName(this.name);
    const pkg = await this.context.packages.findByName(packageName);
    if (!pkg.path) {
      throw new PackageNotFoundError(packageName);
    }
    return pkg.path;
  }

  /**
   * Path of the Guardfile template bundled with the plugin package.
   */
  async templatePath(): Promise<string> {
    return join(await this.pluginLocation(), "lib", GUARD.NAMESPACE, this.name, "templates", "Guardfile");
  }

  /**
   * Append the plugin's template to the Guardfile unless it already declares the plugin.
   */
  async addToGuardfile(): Promise<void> {
    const { evaluator, guardfilePath, ui } = this.context;
    if (await evaluator.guardfileInclude(this.name)) {
      ui.info(`Guardfile already includes ${this.name} guard`);
      return;
    }

    const content = await fs.readFile(guardfilePath, "utf8");
    const template = await fs.readFile(await this.templatePath(), "utf8");
    await writeGuardfileWithTemplate(guardfilePath, content, template);
    ui.info(`${this.name} guard added to Guardfile, feel free to edit it`);
  }

  private async pluginDescriptor(options: PluginClassOptions = {}): Promise<PluginClassDescriptor | undefined> {
    const result = await this.resolve();
    if (result.kind === "resolved") {
      return result.descriptor;
    }
    if (!options.failGracefully) {
      for (const line of result.diagnostics) {
        this.context.ui.error(line);
      }
      this.context.ui.debug(result.cause.stack ?? result.cause.message);
    }
    return undefined;
  }

  private notFound(cause: Error, candidates: readonly string[]): ResolutionResult {
    const namespace = GUARD.CONSTANT_NAMESPACE;
    return {
      kind: "not-found",
      cause,
      diagnostics: [
        `Could not load '${pluginKey(this.name)}' or find class ${namespace}::${constantName(this.name)}`,
        `Error is: ${cause.message}`,
        `Lookup performed by plugin-util, tried ${candidates.map(candidate => `${namespace}::${candidate}`).join(", ")}`
      ]
    };
  }
}
