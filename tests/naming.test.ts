import { describe, expect, it } from "vitest";
import {
  classNameCandidates,
  constantName,
  pluginKey,
  pluginPackageName,
  pluginShortName
} from "../src/utils/naming.js";

describe("pluginShortName", () => {
  it("strips the guard- prefix only at the start", () => {
    expect(pluginShortName("guard-rspec")).toBe("rspec");
    expect(pluginShortName("rspec")).toBe("rspec");
    expect(pluginShortName("my-guard-rspec")).toBe("my-guard-rspec");
  });

  it("is case-sensitive about the prefix", () => {
    expect(pluginShortName("Guard-rspec")).toBe("Guard-rspec");
  });

  it("uses the description of a symbol", () => {
    expect(pluginShortName(Symbol("guard-rspec"))).toBe("rspec");
    expect(pluginShortName(Symbol())).toBe("");
  });
});

describe("pluginKey", () => {
  it("lowercases the name under the guard namespace", () => {
    expect(pluginKey("dashed-class-name")).toBe("guard/dashed-class-name");
    expect(pluginKey("notAGuardClass")).toBe("guard/notaguardclass");
  });
});

describe("pluginPackageName", () => {
  it("prefixes the short name", () => {
    expect(pluginPackageName("rspec")).toBe("guard-rspec");
  });
});

describe("classNameCandidates", () => {
  it("orders exact, dashed, underscored, fully camel-cased and capitalised forms", () => {
    expect(classNameCandidates("dashed-class-name")).toEqual(["dashed-class-name", "DashedClassName", "Dashed-class-name"]);
    expect(classNameCandidates("my_plugin")).toEqual(["my_plugin", "My_plugin", "MyPlugin"]);
  });

  it("camel-cases both separators for mixed names", () => {
    expect(classNameCandidates("mixed-name_here")).toEqual([
      "mixed-name_here",
      "MixedName_here",
      "Mixed-nameHere",
      "MixedNameHere",
      "Mixed-name_here"
    ]);
  });

  it("collapses identical forms", () => {
    expect(classNameCandidates("classname")).toEqual(["classname", "Classname"]);
    expect(classNameCandidates("VSpec")).toEqual(["VSpec"]);
  });
});

describe("constantName", () => {
  it("camel-cases dashes and underscores", () => {
    expect(constantName("dashed-class-name")).toBe("DashedClassName");
    expect(constantName("underscore_class_name")).toBe("UnderscoreClassName");
    expect(constantName("mixed-name_here")).toBe("MixedNameHere");
  });
});
