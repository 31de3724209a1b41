import fs from "fs-extra";
import { debug } from "../logger.js";
import type { GuardfileEvaluator } from "../types.js";

const DECLARATION = /^\s*guard\s*\(?\s*(?::([\w-]+)|"([^"]+)"|'([^']+)')/gm;

/**
 * Names declared by `guard :name`, `guard "name"` or `guard 'name'` lines, lowercased.
 */
export function declaredPlugins(text: string): Set<string> {
  const names = new Set<string>();
  for (const match of text.matchAll(DECLARATION)) {
    const name = match[1] ?? match[2] ?? match[3];
    if (name) {
      names.add(name.toLowerCase());
    }
  }
  return names;
}

/**
 * Line-based Guardfile reader answering whether a plugin is declared.
 *
 * Invariant: a missing Guardfile declares nothing.
 */
export class TextGuardfileEvaluator implements GuardfileEvaluator {
  private declared: Set<string> | undefined;

  constructor(private readonly guardfilePath: string) {}

  async evaluate(): Promise<void> {
    if (!(await fs.pathExists(this.guardfilePath))) {
      debug(`No Guardfile at ${this.guardfilePath}`);
      this.declared = new Set();
      return;
    }
    const text = await fs.readFile(this.guardfilePath, "utf8");
    this.declared = declaredPlugins(text);
    debug(`Guardfile declares ${this.declared.size} plugins`);
  }

  async guardfileInclude(name: string): Promise<boolean> {
    await this.evaluate();
    return this.declared?.has(name.toLowerCase()) ?? false;
  }
}
