import ora, { type Ora } from "ora";
import chalk, { Chalk } from "chalk";

/**
 * Terminal output for the CLI.
 * Headless mode prints plain lines: no spinner, no colour.
 */
export interface CliLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  step(step: number, total: number, message: string): void;
  startSpinner(message: string): void;
  stopSpinner(): void;
  header(title: string): void;
  stats(label: string, value: string | number): void;
}

export function createCliLogger(options: { headless: boolean }): CliLogger {
  const { headless } = options;
  const paint = headless ? new Chalk({ level: 0 }) : chalk;
  let spinner: Ora | null = null;

  const pause = () => {
    if (spinner?.isSpinning) spinner.stop();
  };
  const resume = () => {
    if (spinner) spinner.start();
  };

  return {
    info(message) {
      pause();
      console.log(paint.blue("ℹ"), message);
      resume();
    },

    success(message) {
      pause();
      console.log(paint.green("✓"), message);
      resume();
    },

    warn(message) {
      pause();
      console.log(paint.yellow("⚠"), message);
      resume();
    },

    error(message) {
      pause();
      console.log(paint.red("✗"), message);
      resume();
    },

    step(step, total, message) {
      pause();
      console.log(paint.dim(`[${step}/${total}]`), message);
      resume();
    },

    startSpinner(message) {
      if (headless) {
        return;
      }
      spinner = ora({ text: message, color: "cyan" }).start();
    },

    stopSpinner() {
      if (spinner) {
        spinner.stop();
        spinner = null;
      }
    },

    header(title) {
      console.log();
      console.log(paint.bold.cyan(`═══ ${title} ═══`));
      console.log();
    },

    stats(label, value) {
      console.log(paint.dim(`  ${label}:`), paint.white(value));
    },
  };
}
