import { Command, Flags } from "@oclif/core";
import { docFileForModule, testFileForModule } from "../lib/audit/index.js";
import { commonFlags, prepareAuditOrExit } from "../lib/command-utils.js";
import { Output } from "../lib/output.js";

export default class Models extends Command {
  static description =
    "List audited model modules with their model classes and expected test and doc files";

  static examples = [
    "<%= config.bin %> models",
    "<%= config.bin %> models --json",
  ];

  static flags = {
    ...commonFlags,
    json: Flags.boolean({
      description: "Print the listing as JSON",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Models);
    const out = new Output({ verbose: false });

    const workspace = await prepareAuditOrExit(flags, out);

    const { modules, testCorpus, docCorpus, options } = workspace;
    const rows = modules.map(module => {
      const testFile = testFileForModule(module.id);
      const docFile = docFileForModule(module.id, options.nameMapping);
      return {
        module: module.id,
        classes: module.classes.map(c => c.name),
        testFile,
        testFileFound: testCorpus.files.has(testFile),
        docFile,
        docFileFound: docCorpus.files.has(docFile),
      };
    });

    if (flags.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    if (rows.length === 0) {
      out.warn("No model modules found.");
      return;
    }

    for (const row of rows) {
      out.header(row.module);
      console.log(`  test: ${row.testFile}${row.testFileFound ? "" : " (missing)"}`);
      console.log(`  doc:  ${row.docFile}${row.docFileFound ? "" : " (missing)"}`);
      for (const name of row.classes) {
        console.log(`    - ${name}`);
      }
    }
  }
}
