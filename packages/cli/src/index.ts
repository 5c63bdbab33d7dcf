#!/usr/bin/env -S npx tsx

/**
 * boxprep CLI
 *
 * Fresh-machine bootstrapper for Debian-family hosts.
 * Run `boxprep --help` for usage and the component list.
 */

import { hideBin } from "yargs/helpers";
import { buildCli } from "./cli.js";

await buildCli(hideBin(process.argv)).parseAsync();
