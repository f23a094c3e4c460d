import chalk from "chalk";
import stripAnsi from "strip-ansi";

export type InfoLineItem = {
    title: string,
    value: string | (() => string),
    show?: boolean
};

export function printInfoLine(options: Parameters<typeof renderInfoLine>[0]) {
    console.info(renderInfoLine(options));
}

/**
 * Render a title followed by `title: value` badges, wrapped to fit `maxWidth`.
 * Wrapped lines are indented to start under the first badge.
 */
export function renderInfoLine({
    title, padTitle = 0, info, maxWidth = (process.stdout.columns ?? 80) - 1
}: {
    title?: string,
    padTitle?: number,
    info: InfoLineItem[],
    maxWidth?: number
}) {
    const titleText = (title != null && title.length > 0)
        ? chalk.yellowBright(title.padEnd(padTitle, " "))
        : "";
    const items = info
        .filter((item) => item.show !== false)
        .map(({title, value}) => {
            const valueText = value instanceof Function
                ? value()
                : value;

            return chalk.bgGray(` ${chalk.yellow(title + ":")} ${valueText} `);
        });

    const startPad = titleText === ""
        ? 0
        : stripAnsi(titleText).length + " ".length;
    const lines = splitItemsIntoLines(items, maxWidth - startPad);

    return [titleText, lines.join("\n" + " ".repeat(startPad))]
        .filter((part) => part !== "")
        .join(" ");
}

function splitItemsIntoLines(items: string[], maxLineLength: number) {
    const lines: string[] = [];
    let currentLine: string[] = [];

    for (const item of items) {
        if (currentLine.length > 0 && stripAnsi([...currentLine, item].join(" ")).length > maxLineLength) {
            lines.push(currentLine.join(" "));
            currentLine = [];
        }

        currentLine.push(item);
    }

    if (currentLine.length > 0)
        lines.push(currentLine.join(" "));

    return lines;
}
