import chalk from "chalk";
import {getIsRunningFromCLI} from "../state.js";

/**
 * The CLI prints its own output, so log lines only get a prefix outside of it
 */
export function getConsoleLogPrefix() {
    if (getIsRunningFromCLI())
        return "";

    return chalk.gray("[llm-session]") + " ";
}
