/**
 * Console logging with colored status markers
 *
 *   [+] success   [!] warning   [-] error (stderr)   [*] progress
 */

import chalk from "chalk";

export interface Logger {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    info(message: string): void;
}

export const logger: Logger = {
    log: (message) => console.log(`${chalk.green("[+]")} ${message}`),
    warn: (message) => console.log(`${chalk.yellow("[!]")} ${message}`),
    error: (message) => console.error(`${chalk.red("[-]")} ${message}`),
    info: (message) => console.log(`${chalk.blue("[*]")} ${message}`),
};
