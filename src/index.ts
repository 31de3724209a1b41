#!/usr/bin/env node
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { createPluginContext, type PluginContext } from "./context.js";
export { GuardError, PackageNotFoundError, PluginClassNotFoundError, PluginLoadError } from "./errors.js";
export { TextGuardfileEvaluator } from "./guardfile/evaluator.js";
export { GuardfileGenerator } from "./guardfile/generator.js";
export { PluginModuleLoader } from "./module-loader.js";
export { GuardNamespace, guardNamespace, isModernPluginClass, isPluginClass } from "./namespace.js";
export { NodeModulesRegistry } from "./packages.js";
export { Plugin } from "./plugin.js";
export { PluginUtil } from "./plugin-util.js";
export type * from "./types.js";
