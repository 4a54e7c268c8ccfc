import { describe, it, expect, beforeEach, vi, afterEach, type MockInstance } from "vitest";

vi.mock("fast-glob", () => ({
  default: vi.fn(),
}));

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
}));

import fg from "fast-glob";
import { readFile } from "node:fs/promises";
import { finishAudit, prepareAudit, prepareAuditOrExit, reportPasses } from "./command-utils.js";
import { checkRepoQuality, type Discrepancy } from "./audit/index.js";
import { Output } from "./output.js";

const SURFACE = `
classes:
  PreTrainedModel:
modules:
  modeling_foo:
    classes:
      FooPreTrainedModel: { extends: PreTrainedModel }
      FooModel: { extends: FooPreTrainedModel }
      FooForMaskedLM: { extends: FooPreTrainedModel }
  modeling_utils:
    classes:
      SequenceSummary:
`;

function serveFiles(files: Record<string, string>): void {
  vi.mocked(readFile).mockImplementation(async path => {
    const content = files[String(path)];
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: ${String(path)}`), { code: "ENOENT" });
    }
    return content;
  });
}

describe("prepareAudit", () => {
  let out: Output;

  beforeEach(() => {
    vi.resetAllMocks();
    out = new Output({ verbose: false });
  });

  it("loads defaults, the surface manifest and both corpora", async () => {
    serveFiles({ "/repo/model-surface.yaml": SURFACE });
    vi.mocked(fg)
      .mockResolvedValueOnce(["test_modeling_foo.py", "test_modeling_common.py"])
      .mockResolvedValueOnce(["foo.rst"]);

    const workspace = await prepareAudit({ path: "/repo" }, out);

    expect(workspace.root).toBe("/repo");
    expect(workspace.config.source).toBeNull();
    expect(workspace.modules).toEqual([
      {
        id: "modeling_foo",
        classes: [
          { name: "FooForMaskedLM", moduleId: "modeling_foo" },
          { name: "FooModel", moduleId: "modeling_foo" },
        ],
      },
    ]);
    expect([...workspace.testCorpus.files]).toEqual(["test_modeling_foo.py"]);
    expect([...workspace.docCorpus.files]).toEqual(["foo.rst"]);
    expect(workspace.options.configFile).toBe("modelcheck.yaml");
    expect(workspace.options.libraryName).toBe("transformers");
  });

  it("follows the configured library and directories", async () => {
    serveFiles({
      "/repo/modelcheck.yaml": "library: build/surface.yaml\npaths:\n  tests: test\n  docs: docs\n",
      "/repo/build/surface.yaml": SURFACE,
    });
    vi.mocked(fg).mockResolvedValue([]);

    const workspace = await prepareAudit({ path: "/repo" }, out);

    expect(workspace.modules.map(m => m.id)).toEqual(["modeling_foo"]);
    expect(fg).toHaveBeenNthCalledWith(1, "*", expect.objectContaining({ cwd: "/repo/test" }));
    expect(fg).toHaveBeenNthCalledWith(2, "*", expect.objectContaining({ cwd: "/repo/docs" }));
    expect(workspace.options.configFile).toBe("modelcheck.yaml");
  });

  it("lets the library flag override the configuration", async () => {
    serveFiles({ "/elsewhere/surface.yaml": "modules:\n  modeling_bar:\n" });
    vi.mocked(fg).mockResolvedValue([]);

    const workspace = await prepareAudit({ path: "/repo", library: "/elsewhere/surface.yaml" }, out);

    expect(workspace.modules).toEqual([{ id: "modeling_bar", classes: [] }]);
  });

  it("feeds an end-to-end audit", async () => {
    serveFiles({
      "/repo/model-surface.yaml": SURFACE,
      "/repo/tests/test_modeling_foo.py": "all_model_classes = (FooModel,)\n",
      "/repo/docs/source/model_doc/foo.rst":
        ".. autoclass:: transformers.FooModel\n.. autoclass:: transformers.FooForMaskedLM\n",
    });
    vi.mocked(fg)
      .mockResolvedValueOnce(["test_modeling_foo.py"])
      .mockResolvedValueOnce(["foo.rst"]);

    const workspace = await prepareAudit({ path: "/repo" }, out);
    const result = await checkRepoQuality(workspace);

    expect(result.tested?.map(f => f.className)).toEqual(["FooForMaskedLM"]);
    expect(result.documented).toEqual([]);
  });
});

describe("prepareAuditOrExit", () => {
  let consoleSpy: MockInstance<typeof console.log>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.resetAllMocks();
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it("reports a missing surface manifest and exits 1", async () => {
    serveFiles({});

    await expect(prepareAuditOrExit({ path: "/repo" }, new Output({ verbose: false }))).rejects.toThrow(
      "process.exit"
    );

    expect(exitSpy).toHaveBeenCalledWith(1);
    const calls = consoleSpy.mock.calls.flat().join(" ");
    expect(calls).toContain("/repo/model-surface.yaml: library surface manifest not found");
  });
});

const UNTESTED: Discrepancy = {
  kind: "untested-class",
  moduleId: "modeling_foo",
  file: "test_modeling_foo.py",
  className: "FooForMaskedLM",
  message: "FooForMaskedLM is not tested",
};

const UNDOCUMENTED: Discrepancy = {
  kind: "undocumented-class",
  moduleId: "modeling_foo",
  file: "foo.rst",
  className: "FooModel",
  message: "FooModel is not documented",
};

describe("reportPasses", () => {
  let consoleSpy: MockInstance<typeof console.log>;

  function lines(): string[] {
    return consoleSpy.mock.calls.map(call => String(call[0]));
  }

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("reports a clean pass and a failing one", () => {
    const failed = reportPasses(
      { tested: [], documented: [UNDOCUMENTED] },
      ["tested", "documented"],
      new Output({ verbose: false })
    );

    expect(failed).toBe(true);
    const printed = lines();
    expect(printed).toHaveLength(3);
    expect(printed[0]).toContain("All models are tested");
    expect(printed[1]).toContain("There was 1 failure:");
    expect(printed[2]).toContain("FooModel is not documented");
  });

  it("reports every failing pass", () => {
    const failed = reportPasses(
      { tested: [UNTESTED], documented: [UNDOCUMENTED, { ...UNDOCUMENTED, message: "FooForMaskedLM is not documented" }] },
      ["tested", "documented"],
      new Output({ verbose: false })
    );

    expect(failed).toBe(true);
    const printed = lines();
    expect(printed).toHaveLength(5);
    expect(printed[0]).toContain("There was 1 failure:");
    expect(printed[1]).toContain("FooForMaskedLM is not tested");
    expect(printed[2]).toContain("There were 2 failures:");
    expect(printed[3]).toContain("FooModel is not documented");
    expect(printed[4]).toContain("FooForMaskedLM is not documented");
  });

  it("only reports the requested passes", () => {
    const failed = reportPasses(
      { tested: [UNTESTED], documented: [] },
      ["documented"],
      new Output({ verbose: false })
    );

    expect(failed).toBe(false);
    const printed = lines();
    expect(printed).toHaveLength(1);
    expect(printed[0]).toContain("All models are documented");
  });
});

describe("finishAudit", () => {
  let consoleSpy: MockInstance<typeof console.log>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    exitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it("exits 1 after the summary when a pass failed", () => {
    expect(() =>
      finishAudit({ tested: [], documented: [UNDOCUMENTED] }, ["tested", "documented"], new Output({ verbose: false }))
    ).toThrow("process.exit");

    expect(exitSpy).toHaveBeenCalledWith(1);
    const last = String(consoleSpy.mock.calls[consoleSpy.mock.calls.length - 1][0]);
    expect(last).toContain("Found 1 coverage issue(s) in");
  });

  it("returns normally when every pass is clean", () => {
    finishAudit({ tested: [], documented: [] }, ["tested", "documented"], new Output({ verbose: false }));

    expect(exitSpy).not.toHaveBeenCalled();
  });
});
