#!/usr/bin/env node

import {fileURLToPath} from "url";
import path from "path";
import yargs from "yargs";
import {hideBin} from "yargs/helpers";
import fs from "fs-extra";
import {cliBinName} from "../config.js";
import {setIsRunningFromCLI} from "../state.js";
import {ChatCommand} from "./commands/ChatCommand.js";
import {InspectCommand} from "./commands/InspectCommand.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const packageJson: unknown = fs.readJSONSync(path.join(__dirname, "..", "..", "package.json"));
const packageVersion = (packageJson != null && typeof packageJson === "object" && "version" in packageJson &&
    typeof packageJson.version === "string")
    ? packageJson.version
    : "0.0.0";

setIsRunningFromCLI(true);

const yarg = yargs(hideBin(process.argv));

yarg
    .scriptName(cliBinName)
    .usage("Usage: $0 <command> [options]")
    .command(ChatCommand)
    .command(InspectCommand)
    .recommendCommands()
    .demandCommand(1)
    .strict()
    .strictCommands()
    .alias("v", "version")
    .help("h")
    .alias("h", "help")
    .version(packageVersion)
    .wrap(Math.min(130, yarg.terminalWidth()))
    .parse();
