import * as dotenv from "dotenv";
import { homedir } from "os";
import { join, resolve } from "path";

dotenv.config();

/**
 * Naming conventions shared by discovery, class lookup and template sourcing.
 *
 * Invariant: `PREFIX` is stripped from package names to obtain plugin short names,
 * and `NAMESPACE` is the directory under a package's `lib` holding plugin modules.
 */
export const GUARD = {
  PREFIX: "guard-",
  NAMESPACE: "guard",
  CONSTANT_NAMESPACE: "Guard",
  MODULE_EXTENSIONS: [".js", ".mjs", ".cjs"]
} as const;

/**
 * Filesystem locations used by the Guardfile integrator and generator.
 */
export const PATHS = {
  PROJECT_ROOT: resolve(process.env.GUARD_PROJECT_ROOT ?? process.cwd()),
  GUARDFILE: process.env.GUARDFILE ?? "Guardfile",
  USER_TEMPLATES: process.env.GUARD_HOME
    ? join(process.env.GUARD_HOME, "templates")
    : join(homedir(), ".guard", "templates"),
  GENERIC_TEMPLATE: new URL("../templates/Guardfile", import.meta.url)
} as const;
