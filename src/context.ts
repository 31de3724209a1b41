import { resolve } from "path";
import { PATHS } from "./config.js";
import { TextGuardfileEvaluator } from "./guardfile/evaluator.js";
import { ui as defaultUi } from "./logger.js";
import { PluginModuleLoader } from "./module-loader.js";
import { guardNamespace, type GuardNamespace } from "./namespace.js";
import { NodeModulesRegistry } from "./packages.js";
import type { GuardfileEvaluator, ModuleLoader, PackageRegistry, Ui } from "./types.js";

/**
 * Collaborators shared by plugin resolution and Guardfile scaffolding.
 */
export interface PluginContext {
  readonly namespace: GuardNamespace;
  readonly loader: ModuleLoader;
  readonly packages: PackageRegistry;
  readonly evaluator: GuardfileEvaluator;
  readonly ui: Ui;
  readonly guardfilePath: string;
}

/**
 * Build a context for the configured project, keeping any collaborator supplied in `overrides`.
 *
 * @param overrides - Collaborators to use instead of the defaults.
 * @returns Complete context.
 */
export async function createPluginContext(overrides: Partial<PluginContext> = {}): Promise<PluginContext> {
  const namespace = overrides.namespace ?? guardNamespace;
  const packages = overrides.packages ?? new NodeModulesRegistry(PATHS.PROJECT_ROOT);
  const guardfilePath = overrides.guardfilePath ?? resolve(PATHS.PROJECT_ROOT, PATHS.GUARDFILE);
  return {
    namespace,
    packages,
    guardfilePath,
    loader: overrides.loader ?? (await PluginModuleLoader.forProject(namespace, packages, PATHS.PROJECT_ROOT)),
    evaluator: overrides.evaluator ?? new TextGuardfileEvaluator(guardfilePath),
    ui: overrides.ui ?? defaultUi
  };
}
