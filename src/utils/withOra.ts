import ora from "ora";
import chalk from "chalk";
import {useCiLogs} from "../config.js";
import {getConsoleLogPrefix} from "./getConsoleLogPrefix.js";
import withStatusLogs, {StatusUpdater} from "./withStatusLogs.js";

export default async function withOra<T>(
    message: {
        loading: string,
        success: string,
        fail: string,
        useStatusLogs?: boolean
    },
    callback: (setStatus: StatusUpdater) => Promise<T>
): Promise<T> {
    if (useCiLogs || message.useStatusLogs)
        return withStatusLogs(message, callback);

    const spinner = ora({
        prefixText: getConsoleLogPrefix(),
        text: message.loading
    });

    spinner.start();

    const setStatus: StatusUpdater = (status) => {
        spinner.text = `${message.loading} ${chalk.gray(status)}`;
    };

    try {
        const res = await callback(setStatus);
        spinner.succeed(message.success);

        return res;
    } catch (er) {
        spinner.fail(message.fail);

        throw er;
    }
}
