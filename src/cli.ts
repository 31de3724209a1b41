import { Command } from "commander";
import { createPluginContext, type PluginContext } from "./context.js";
import { GuardfileGenerator, type GeneratorOptions } from "./guardfile/generator.js";
import { error as logError, info } from "./logger.js";
import { PluginUtil } from "./plugin-util.js";

export interface PluginRow {
  readonly plugin: string;
  readonly guardfile: boolean;
}

/**
 * Installed plugins in name order, each flagged when the Guardfile declares it.
 */
export async function listPlugins(context: PluginContext): Promise<PluginRow[]> {
  const names = [...(await PluginUtil.pluginNames(context.packages))].sort();
  const rows: PluginRow[] = [];
  for (const plugin of names) {
    rows.push({ plugin, guardfile: await context.evaluator.guardfileInclude(plugin) });
  }
  return rows;
}

/**
 * List mode entry point: print installed plugins as a table.
 */
export async function listAction(context?: PluginContext): Promise<void> {
  const rows = await listPlugins(context ?? (await createPluginContext()));
  if (rows.length === 0) {
    info("No plugins installed.");
    return;
  }
  info("Available plugins:");
  console.table(rows.map(row => ({ Plugin: row.plugin, Guardfile: row.guardfile ? "yes" : "" })));
}

export interface InitOptions extends GeneratorOptions {
  /** Only create the Guardfile. */
  readonly bare?: boolean;
}

/**
 * Init mode entry point: create the Guardfile when missing, then append plugin templates.
 *
 * @param plugins - Plugin names; every installed plugin when empty.
 * @returns Names whose template could not be found.
 */
export async function initAction(
  plugins: readonly string[],
  options: InitOptions = {},
  context?: PluginContext
): Promise<string[]> {
  const generator = new GuardfileGenerator(context ?? (await createPluginContext()), options);
  await generator.createGuardfile();
  if (options.bare) {
    return [];
  }
  if (plugins.length === 0) {
    return generator.initializeAllTemplates();
  }
  const missing: string[] = [];
  for (const plugin of plugins) {
    if (!(await generator.initializeTemplate(plugin))) {
      missing.push(plugin);
    }
  }
  return missing;
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("guardsmith").description("Discover guard plugins and scaffold their Guardfile sections").version("1.0.0");

  program.command("list").description("List installed plugins").action(async () => listAction());
  program
    .command("init")
    .description("Create a Guardfile and append plugin templates")
    .argument("[plugins...]", "plugins to add; all installed plugins when omitted")
    .option("--bare", "only create the Guardfile")
    .action(async (plugins: string[], options: InitOptions) => {
      const missing = await initAction(plugins, options);
      if (missing.length > 0) {
        process.exitCode = 1;
      }
    });

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
