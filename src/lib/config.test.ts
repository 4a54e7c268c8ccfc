import { describe, it, expect, beforeEach, vi } from "vitest";
import { readFile } from "node:fs/promises";
import {
  ConfigError,
  defaultConfig,
  loadConfig,
  parseConfig,
  toExceptionList,
  toModelRules,
} from "./config.js";

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
}));

function notFound(): Error {
  return Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
}

describe("defaultConfig", () => {
  it("carries the built-in conventions", () => {
    const config = defaultConfig();

    expect(config.library).toBe("model-surface.yaml");
    expect(config.libraryName).toBe("transformers");
    expect(config.paths).toEqual({ tests: "tests", docs: "docs/source/model_doc" });
    expect(config.modulePrefix).toBe("modeling");
    expect(config.baseClasses).toEqual(["PreTrainedModel", "TFPreTrainedModel"]);
    expect(config.ignoreDocFiles).toEqual(["auto", "dialogpt", "marian", "retribert"]);
    expect(config.modelNameToDocFile.openai).toBe("gpt.rst");
    expect(config.source).toBeNull();
  });

  it("returns fresh lists each time", () => {
    const first = defaultConfig();
    first.ignoreNonTested.push("FooModel");
    expect(defaultConfig().ignoreNonTested).not.toContain("FooModel");
  });
});

describe("parseConfig", () => {
  it("returns defaults for an empty file", () => {
    const config = parseConfig("", "modelcheck.yaml");
    expect(config).toEqual({ ...defaultConfig(), source: "modelcheck.yaml" });
  });

  it("replaces lists and merges the doc file mapping", () => {
    const config = parseConfig(
      [
        "ignoreNonTested: [FooModel]",
        "modelNameToDocFile:",
        "  foo_bar: foobar.rst",
        "paths:",
        "  docs: docs/models",
        "libraryName: mylib",
      ].join("\n"),
      "modelcheck.yaml"
    );

    expect(config.ignoreNonTested).toEqual(["FooModel"]);
    expect(config.modelNameToDocFile).toEqual({
      openai: "gpt.rst",
      transfo_xl: "transformerxl.rst",
      xlm_roberta: "xlmroberta.rst",
      foo_bar: "foobar.rst",
    });
    expect(config.paths).toEqual({ tests: "tests", docs: "docs/models" });
    expect(config.libraryName).toBe("mylib");
  });

  it("accepts an emptied list", () => {
    expect(parseConfig("ignoreModules: []\n", "c.yaml").ignoreModules).toEqual([]);
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig("ignoreNonTest: [FooModel]\n", "modelcheck.yaml")).toThrow(
      "modelcheck.yaml: unknown key ignoreNonTest"
    );
  });

  it("rejects unknown path keys", () => {
    expect(() => parseConfig("paths:\n  examples: examples\n", "c.yaml")).toThrow("c.yaml: unknown key paths.examples");
  });

  it("rejects lists of the wrong shape", () => {
    expect(() => parseConfig("ignoreNonTested: FooModel\n", "c.yaml")).toThrow(
      "c.yaml: ignoreNonTested must be a list of strings"
    );
    expect(() => parseConfig("ignoreNonTested: [1]\n", "c.yaml")).toThrow(
      "c.yaml: ignoreNonTested[0] must be a non-empty string"
    );
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => parseConfig("- a\n- b\n", "c.yaml")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("reads modelcheck.yaml from the root", async () => {
    vi.mocked(readFile).mockResolvedValue("modulePrefix: modeling_tf\n");

    const config = await loadConfig("/repo");

    expect(readFile).toHaveBeenCalledWith("/repo/modelcheck.yaml", "utf-8");
    expect(config.modulePrefix).toBe("modeling_tf");
    expect(config.source).toBe("/repo/modelcheck.yaml");
  });

  it("falls back to defaults when the root has no configuration", async () => {
    vi.mocked(readFile).mockRejectedValue(notFound());

    await expect(loadConfig("/repo")).resolves.toEqual(defaultConfig());
  });

  it("fails when an explicit configuration is missing", async () => {
    vi.mocked(readFile).mockRejectedValue(notFound());

    await expect(loadConfig("/repo", "/etc/modelcheck.yaml")).rejects.toThrow(
      "/etc/modelcheck.yaml: configuration file not found"
    );
  });

  it("does not mistake an unreadable configuration for a missing one", async () => {
    vi.mocked(readFile).mockRejectedValue(
      Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" })
    );

    await expect(loadConfig("/repo")).rejects.toThrow(
      "/repo/modelcheck.yaml: cannot read configuration file: EACCES: permission denied"
    );
  });
});

describe("toExceptionList", () => {
  it("turns the allow-lists into sets", () => {
    const exceptions = toExceptionList(defaultConfig());

    expect(exceptions.ignoreNonTested.has("T5Stack")).toBe(true);
    expect(exceptions.testFilesWithNoCommonTests.has("test_modeling_camembert.py")).toBe(true);
    expect(exceptions.ignoreNonDocumented.has("DPREncoder")).toBe(true);
    expect(exceptions.ignoreNonDocumented.has("BertLMHeadModel")).toBe(false);
  });
});

describe("toModelRules", () => {
  it("passes the enumeration settings through", () => {
    const config = parseConfig("modulePrefix: models\nignoreModules: [models_shared]\n", "c.yaml");

    expect(toModelRules(config)).toEqual({
      modulePrefix: "models",
      ignoreModules: ["models_shared"],
      baseClasses: ["PreTrainedModel", "TFPreTrainedModel"],
      abstractMarkers: ["Pretrained", "PreTrained"],
    });
  });
});
