import fs from "fs-extra";
import { join } from "path";
import { fileURLToPath } from "url";
import { GUARD, PATHS } from "../config.js";
import type { PluginContext } from "../context.js";
import { PluginUtil } from "../plugin-util.js";
import { constantName, pluginKey } from "../utils/naming.js";
import { writeGuardfileWithTemplate } from "./append.js";

export interface GeneratorOptions {
  /** Directory of user templates named after plugins. */
  readonly userTemplatesDir?: string;
  /** Template copied when creating a Guardfile. */
  readonly genericTemplate?: string;
}

/**
 * Creates the Guardfile and fills it with plugin templates.
 */
export class GuardfileGenerator {
  private readonly userTemplatesDir: string;
  private readonly genericTemplate: string;

  constructor(
    private readonly context: PluginContext,
    options: GeneratorOptions = {}
  ) {
    this.userTemplatesDir = options.userTemplatesDir ?? PATHS.USER_TEMPLATES;
    this.genericTemplate = options.genericTemplate ?? fileURLToPath(PATHS.GENERIC_TEMPLATE);
  }

  /**
   * Copy the generic template to the Guardfile location unless a Guardfile exists.
   *
   * @returns Whether a new Guardfile was written.
   */
  async createGuardfile(): Promise<boolean> {
    const { guardfilePath, ui } = this.context;
    if (await fs.pathExists(guardfilePath)) {
      ui.warn(`Guardfile already exists at ${guardfilePath}`);
      return false;
    }
    ui.info(`Writing new Guardfile to ${guardfilePath}`);
    await fs.copy(this.genericTemplate, guardfilePath);
    return true;
  }

  /**
   * Add a plugin's template: from its package when the plugin class resolves, otherwise from
   * the user template directory.
   *
   * @param pluginName - Short or prefixed plugin name.
   * @returns Whether a template was found.
   */
  async initializeTemplate(pluginName: string): Promise<boolean> {
    const { guardfilePath, ui } = this.context;
    const plugin = new PluginUtil(pluginName, this.context);
    if (await plugin.pluginClass({ failGracefully: true })) {
      await plugin.addToGuardfile();
      return true;
    }

    const lowered = plugin.name.toLowerCase();
    const userTemplate = join(this.userTemplatesDir, lowered);
    if (await fs.pathExists(userTemplate)) {
      const content = await fs.readFile(guardfilePath, "utf8");
      const template = await fs.readFile(userTemplate, "utf8");
      await writeGuardfileWithTemplate(guardfilePath, content, template);
      ui.info(`${plugin.name} template added to Guardfile, feel free to edit it`);
      return true;
    }

    ui.error(
      `Could not load '${pluginKey(plugin.name)}' or '${userTemplate}' or find class ${GUARD.CONSTANT_NAMESPACE}::${constantName(plugin.name)}`
    );
    return false;
  }

  /**
   * Add the template of every installed plugin, in name order.
   *
   * @returns Names whose template could not be found.
   */
  async initializeAllTemplates(): Promise<string[]> {
    const names = [...(await PluginUtil.pluginNames(this.context.packages))].sort();
    const missing: string[] = [];
    for (const name of names) {
      if (!(await this.initializeTemplate(name))) {
        missing.push(name);
      }
    }
    return missing;
  }
}
