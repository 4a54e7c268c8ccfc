import { Command, Flags } from "@oclif/core";
import { ALL_PASSES, checkRepoQuality } from "../lib/audit/index.js";
import { commonFlags, finishAudit, prepareAuditOrExit } from "../lib/command-utils.js";
import { Output } from "../lib/output.js";

export default class Check extends Command {
  static description =
    "Check every model class is covered by its test file and documented in its doc page (deterministic, for CI)";

  static examples = [
    "<%= config.bin %> check",
    "<%= config.bin %> check --path ./my-library",
    "<%= config.bin %> check --only documented",
    "<%= config.bin %> check --library build/model-surface.yaml -v",
  ];

  static flags = {
    ...commonFlags,
    only: Flags.string({
      description: "Run a single pass",
      options: ["tested", "documented"],
    }),
    verbose: Flags.boolean({
      char: "v",
      description: "Show progress and discrepancy kinds",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Check);
    const out = new Output({ verbose: flags.verbose });

    const workspace = await prepareAuditOrExit(flags, out);

    const passes = ALL_PASSES.filter(pass => flags.only === undefined || pass === flags.only);
    const result = await checkRepoQuality({ ...workspace, passes });

    finishAudit(result, passes, out);
  }
}
