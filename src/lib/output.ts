import chalk from "chalk";
import { failureHeader } from "./audit/report.js";
import type { Discrepancy } from "./audit/types.js";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;
  private startTime: number;
  private failureCount: number = 0;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
    this.startTime = Date.now();
  }

  // Progress messages
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Section header
  header(title: string): void {
    console.log(chalk.cyan(title));
  }

  // List item (with failure marker)
  item(msg: string): void {
    console.log(chalk.red("  ✗") + " " + msg);
  }

  /**
   * Print a failed pass: the count line, then one item per discrepancy.
   * In verbose mode each item is tagged with its kind.
   */
  failures(discrepancies: readonly Discrepancy[]): void {
    this.failureCount += discrepancies.length;
    this.error(failureHeader(discrepancies.length));
    for (const d of discrepancies) {
      const tag = this.verbose ? chalk.dim(`[${d.kind}] `) : "";
      this.item(tag + d.message);
    }
  }

  // Final summary
  summary(): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    if (this.failureCount === 0) {
      this.info(`Done in ${elapsed}s.`);
    } else {
      console.log();
      console.log(chalk.white(`Found ${this.failureCount} coverage issue(s) in ${elapsed}s.`));
    }
  }
}
