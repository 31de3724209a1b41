import fs from "fs-extra";
import { join } from "path";
import { PackageNotFoundError } from "./errors.js";
import { debug, warn } from "./logger.js";
import type { InstalledPackage, PackageRegistry } from "./types.js";

function isRecord(value: unknown): value is { readonly [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readManifest(packageDir: string): Promise<InstalledPackage | undefined> {
  const manifestPath = join(packageDir, "package.json");
  if (!(await fs.pathExists(manifestPath))) {
    return undefined;
  }
  try {
    const manifest: unknown = await fs.readJson(manifestPath);
    if (!isRecord(manifest) || typeof manifest.name !== "string") {
      debug(`Skipping ${packageDir}: manifest has no name`);
      return undefined;
    }
    return {
      name: manifest.name,
      version: typeof manifest.version === "string" ? manifest.version : undefined,
      path: packageDir
    };
  } catch (error) {
    warn(`Skipping ${packageDir}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

/**
 * Package registry backed by a project's `node_modules` directory, including `@scope` folders.
 */
export class NodeModulesRegistry implements PackageRegistry {
  private readonly modulesDir: string;

  /**
   * @param projectRoot - Directory containing `node_modules`.
   */
  constructor(projectRoot: string) {
    this.modulesDir = join(projectRoot, "node_modules");
  }

  async findAll(): Promise<InstalledPackage[]> {
    if (!(await fs.pathExists(this.modulesDir))) {
      debug(`No node_modules at ${this.modulesDir}`);
      return [];
    }
    const packages: InstalledPackage[] = [];
    for (const entry of (await fs.readdir(this.modulesDir)).sort()) {
      if (entry.startsWith(".")) {
        continue;
      }
      const entryPath = join(this.modulesDir, entry);
      if (entry.startsWith("@")) {
        for (const scoped of (await fs.readdir(entryPath)).sort()) {
          const found = await readManifest(join(entryPath, scoped));
          if (found) {
            packages.push(found);
          }
        }
        continue;
      }
      const found = await readManifest(entryPath);
      if (found) {
        packages.push(found);
      }
    }
    debug(`Found ${packages.length} installed packages in ${this.modulesDir}`);
    return packages;
  }

  async findByName(name: string): Promise<InstalledPackage> {
    const found = await readManifest(join(this.modulesDir, name));
    if (!found || found.name !== name) {
      throw new PackageNotFoundError(name);
    }
    return found;
  }
}
