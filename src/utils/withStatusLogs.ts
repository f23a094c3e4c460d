import chalk from "chalk";
import logSymbols from "log-symbols";
import {clockChar} from "../consts.js";
import {getConsoleLogPrefix} from "./getConsoleLogPrefix.js";

export type StatusUpdater = (status: string) => void;

/**
 * Plain-line fallback of `withOra` for environments without a live terminal (CI).
 * Every status change is printed on its own line.
 */
export default async function withStatusLogs<T>(
    message: {
        loading: string,
        success: string,
        fail: string
    },
    callback: (setStatus: StatusUpdater) => Promise<T>
): Promise<T> {
    console.log(getConsoleLogPrefix() + `${chalk.cyan(clockChar)} ${message.loading}`);

    let lastStatus: string | null = null;
    const setStatus: StatusUpdater = (status) => {
        if (status === lastStatus)
            return;

        lastStatus = status;
        console.log(getConsoleLogPrefix() + `${chalk.cyan(clockChar)} ${message.loading} ${chalk.gray(status)}`);
    };

    try {
        const res = await callback(setStatus);
        console.log(getConsoleLogPrefix() + `${logSymbols.success} ${message.success}`);

        return res;
    } catch (er) {
        console.log(getConsoleLogPrefix() + `${logSymbols.error} ${message.fail}`);

        throw er;
    }
}
