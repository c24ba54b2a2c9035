import chalk from "chalk";

type LoggerOptions = {
  quiet?: boolean;
};

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(options: LoggerOptions = {}) {
  const quiet = Boolean(options.quiet);
  const log = (...args: unknown[]) => {
    if (!quiet) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const info = (message: string) => {
    log(`${chalk.cyan("[+]")} ${message}`);
  };
  const success = (message: string) => {
    log(`${chalk.green("[+]")} ${message}`);
  };
  const warn = (message: string) => {
    // eslint-disable-next-line no-console
    console.warn(`${chalk.yellow("[!]")} ${message}`);
  };
  const error = (message: string) => {
    // eslint-disable-next-line no-console
    console.error(`${chalk.red("[!]")} ${message}`);
  };
  return {
    quiet,
    log,
    info,
    success,
    warn,
    error
  };
}
