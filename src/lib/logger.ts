import chalk from "chalk";

/**
 * Tagged, coloured terminal output shared by every command.
 * Errors and failures go to stderr, everything else to stdout.
 */
export const log = {
  info: (message: string): void => {
    console.log(chalk.cyan("[INFO]"), message);
  },

  error: (message: string): void => {
    console.error(chalk.red("[ERROR]"), message);
  },

  warn: (message: string): void => {
    console.warn(chalk.yellow("[WARN]"), message);
  },

  ok: (message: string): void => {
    console.log(chalk.green("[OK]"), message);
  },

  fail: (message: string): void => {
    console.error(chalk.red("[FAIL]"), message);
  },

  /**
   * [STEP] - Header printed before each provisioning stage
   */
  step: (stage: string): void => {
    console.log(chalk.magenta("[STEP]"), chalk.bold(stage));
  },

  alert: (message: string): void => {
    console.error(chalk.red.bold("[ALERT]"), message);
  },

  summary: (message: string): void => {
    console.log(chalk.bold("[SUMMARY]"), message);
  },

  success: (message: string): void => {
    console.log(chalk.green.bold("[SUCCESS]"), message);
  },

  /**
   * Section headers for status reports
   */
  passed: (): void => {
    console.log(chalk.green("[PASSED]"));
  },

  failures: (): void => {
    console.log(chalk.red("[FAILURES]"));
  },

  warnings: (): void => {
    console.log(chalk.yellow("[WARNINGS]"));
  },

  checkmark: (message: string): void => {
    console.log("  ", chalk.green("✔"), message);
  },

  cross: (message: string): void => {
    console.log("  ", chalk.red("✗"), message);
  },

  warningMark: (message: string): void => {
    console.log("  ", chalk.yellow("⚠"), message);
  },

  separator: (char: string = "="): void => {
    console.log(char.repeat(60));
  },

  blank: (): void => {
    console.log();
  },

  raw: (message: string): void => {
    console.log(message);
  },
};
