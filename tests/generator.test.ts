import fs from "fs-extra";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PluginLoadError } from "../src/errors.js";
import { GuardfileGenerator } from "../src/guardfile/generator.js";
import { Plugin } from "../src/plugin.js";
import { stubContext } from "./support/context.js";

describe("GuardfileGenerator", () => {
  let workDir: string;
  let guardfile: string;
  let userTemplatesDir: string;
  let genericTemplate: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), "guardsmith-generator-"));
    guardfile = join(workDir, "Guardfile");
    userTemplatesDir = join(workDir, "templates");
    genericTemplate = join(workDir, "generic");
    await fs.ensureDir(userTemplatesDir);
    await fs.writeFile(genericTemplate, "# generic\n");
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  describe("createGuardfile", () => {
    it("copies the generic template when no Guardfile exists", async () => {
      const { context, ui } = stubContext(guardfile);

      const created = await new GuardfileGenerator(context, { genericTemplate }).createGuardfile();

      expect(created).toBe(true);
      expect(await fs.readFile(guardfile, "utf8")).toBe("# generic\n");
      expect(ui.info).toHaveBeenCalledWith(`Writing new Guardfile to ${guardfile}`);
    });

    it("keeps an existing Guardfile", async () => {
      await fs.writeFile(guardfile, "guard :rspec\n");
      const { context, ui } = stubContext(guardfile);

      const created = await new GuardfileGenerator(context, { genericTemplate }).createGuardfile();

      expect(created).toBe(false);
      expect(await fs.readFile(guardfile, "utf8")).toBe("guard :rspec\n");
      expect(ui.warn).toHaveBeenCalledWith(`Guardfile already exists at ${guardfile}`);
    });

    it("ships a bundled generic template", async () => {
      const { context } = stubContext(guardfile);

      await new GuardfileGenerator(context).createGuardfile();

      expect(await fs.readFile(guardfile, "utf8")).toMatch(/^# A sample Guardfile\n/);
    });
  });

  describe("initializeTemplate", () => {
    it("appends the template bundled with a resolvable plugin", async () => {
      const packageDir = join(workDir, "guard-myguard");
      await fs.writeFile(guardfile, "# header");
      await fs.outputFile(join(packageDir, "lib", "guard", "myguard", "templates", "Guardfile"), "guard :myguard");
      const { context, namespace, findByName, ui } = stubContext(guardfile);
      namespace.define("Myguard", class Myguard extends Plugin {});
      findByName.mockResolvedValue({ name: "guard-myguard", path: packageDir });

      const added = await new GuardfileGenerator(context, { userTemplatesDir }).initializeTemplate("myguard");

      expect(added).toBe(true);
      expect(await fs.readFile(guardfile, "utf8")).toBe("# header\n\nguard :myguard\n");
      expect(ui.info).toHaveBeenCalledWith("myguard guard added to Guardfile, feel free to edit it");
    });

    it("falls back to a user template without reporting the failed lookup", async () => {
      await fs.writeFile(guardfile, "# header");
      await fs.writeFile(join(userTemplatesDir, "myguard"), "guard :myguard\n");
      const { context, require, ui } = stubContext(guardfile);
      require.mockRejectedValue(new PluginLoadError("guard/myguard"));

      const added = await new GuardfileGenerator(context, { userTemplatesDir }).initializeTemplate("MyGuard");

      expect(added).toBe(true);
      expect(await fs.readFile(guardfile, "utf8")).toBe("# header\n\nguard :myguard\n");
      expect(ui.info).toHaveBeenCalledWith("MyGuard template added to Guardfile, feel free to edit it");
      expect(ui.error).not.toHaveBeenCalled();
    });

    it("reports a plugin with neither class nor template", async () => {
      await fs.writeFile(guardfile, "# header");
      const { context, require, ui } = stubContext(guardfile);
      require.mockRejectedValue(new PluginLoadError("guard/nothing"));

      const added = await new GuardfileGenerator(context, { userTemplatesDir }).initializeTemplate("nothing");

      expect(added).toBe(false);
      expect(ui.error.mock.calls).toEqual([
        [`Could not load 'guard/nothing' or '${join(userTemplatesDir, "nothing")}' or find class Guard::Nothing`]
      ]);
      expect(await fs.readFile(guardfile, "utf8")).toBe("# header");
    });
  });

  describe("initializeAllTemplates", () => {
    it("visits installed plugins in name order and returns those without a template", async () => {
      await fs.writeFile(guardfile, "# header");
      await fs.writeFile(join(userTemplatesDir, "beta"), "guard :beta");
      const { context, require, findAll, ui } = stubContext(guardfile);
      require.mockImplementation(async key => {
        throw new PluginLoadError(key);
      });
      findAll.mockResolvedValue([{ name: "guard-gamma" }, { name: "guard-beta" }, { name: "guard-alpha" }]);

      const missing = await new GuardfileGenerator(context, { userTemplatesDir }).initializeAllTemplates();

      expect(missing).toEqual(["alpha", "gamma"]);
      expect(require.mock.calls.map(([key]) => key)).toEqual(["guard/alpha", "guard/beta", "guard/gamma"]);
      expect(await fs.readFile(guardfile, "utf8")).toBe("# header\n\nguard :beta\n");
      expect(ui.error).toHaveBeenCalledTimes(2);
    });
  });
});
