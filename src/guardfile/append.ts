import fs from "fs-extra";

function asLine(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

/**
 * Compose the new Guardfile text: existing content, one blank line, then the template.
 */
export function composeGuardfile(content: string, template: string): string {
  return `${asLine(content)}\n${asLine(template)}`;
}

/**
 * Overwrite the Guardfile with `content` followed by `template` through a single open/write/close.
 *
 * Invariant: the descriptor is closed even when the write fails.
 *
 * @param guardfilePath - Target Guardfile.
 * @param content - Current Guardfile text.
 * @param template - Template text to append.
 */
export async function writeGuardfileWithTemplate(guardfilePath: string, content: string, template: string): Promise<void> {
  const fd = await fs.open(guardfilePath, "w");
  try {
    await fs.writeFile(fd, composeGuardfile(content, template), "utf8");
  } finally {
    await fs.close(fd);
  }
}
