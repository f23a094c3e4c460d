import process from "process";
import path from "path";
import {CommandModule} from "yargs";
import chalk from "chalk";
import {getRuntime} from "../../bindings/getRuntime.js";
import {LogLevel, LogLevelValues} from "../../bindings/types.js";
import {LlmSession} from "../../evaluator/LlmSession/LlmSession.js";
import {unwrapResult} from "../../result/Result.js";
import withOra from "../../utils/withOra.js";
import {printInfoLine} from "../utils/printInfoLine.js";

type InspectCommand = {
    modelPath: string,
    mmproj?: string,
    bindingPath?: string,
    logLevel: LogLevel
};

export const InspectCommand: CommandModule<object, InspectCommand> = {
    command: "inspect <modelPath>",
    describe: "Check that a model file, and optionally a multimodal projector file, can be loaded, and print the model info",
    builder(yargs) {
        return yargs
            .positional("modelPath", {
                alias: ["m", "model", "path"],
                type: "string",
                demandOption: true,
                description: "Model file to inspect"
            })
            .option("mmproj", {
                type: "string",
                description: "Multimodal projector file to check"
            })
            .option("bindingPath", {
                alias: "binding",
                type: "string",
                description: "Path to the native engine module. Defaults to the LLM_SESSION_BINDING_PATH environment variable"
            })
            .option("logLevel", {
                type: "string",
                choices: LogLevelValues,
                default: LogLevel.warn,
                description: "Log level of the engine"
            });
    },
    async handler({modelPath, mmproj, bindingPath, logLevel}: InspectCommand) {
        try {
            await InspectModel({modelPath, mmproj, bindingPath, logLevel});
        } catch (err) {
            await new Promise((accept) => setTimeout(accept, 0)); // wait for logs to finish printing
            console.error(err);
            process.exit(1);
        }
    }
};

async function InspectModel({modelPath, mmproj, bindingPath, logLevel}: InspectCommand) {
    if (mmproj != null)
        await withOra({
            loading: chalk.blue("Checking multimodal projector"),
            success: chalk.blue("Multimodal projector is valid"),
            fail: chalk.blue("Invalid multimodal projector")
        }, async () => {
            unwrapResult(await LlmSession.validateMmproj(mmproj));
        });

    const runtime = getRuntime({bindingPath, logLevel});
    const modelInfo = await withOra({
        loading: chalk.blue("Loading model"),
        success: chalk.blue("Model loaded"),
        fail: chalk.blue("Failed to load model"),
        useStatusLogs: logLevel === LogLevel.debug
    }, async () => {
        return unwrapResult(await runtime.validateModel(modelPath));
    });

    printInfoLine({
        title: "Model",
        padTitle: "Projector".length,
        info: [{
            title: "File",
            value: path.resolve(process.cwd(), modelPath)
        }, {
            title: "Name",
            value: modelInfo.name
        }, {
            title: "Architecture",
            value: modelInfo.architecture
        }, {
            title: "Parameters",
            value: modelInfo.parameterCount.toLocaleString("en-US")
        }, {
            title: "Train context size",
            value: String(modelInfo.contextSize)
        }]
    });

    if (mmproj != null)
        printInfoLine({
            title: "Projector",
            padTitle: "Projector".length,
            info: [{
                title: "File",
                value: path.resolve(process.cwd(), mmproj)
            }]
        });
}
