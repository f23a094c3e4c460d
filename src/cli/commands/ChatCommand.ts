import * as readline from "readline";
import process from "process";
import path from "path";
import {CommandModule} from "yargs";
import chalk from "chalk";
import fs from "fs-extra";
import {defaultChatSystemPrompt} from "../../config.js";
import {getRuntime} from "../../bindings/getRuntime.js";
import {LogLevel, LogLevelValues} from "../../bindings/types.js";
import {CancellationToken} from "../../evaluator/CancellationToken.js";
import {defaultSamplingParams, unlimitedTokens} from "../../evaluator/SamplingParams.js";
import {defaultSessionParams} from "../../evaluator/SessionParams.js";
import {SessionErrorCode} from "../../result/SessionErrorCode.js";
import {unwrapResult} from "../../result/Result.js";
import withOra from "../../utils/withOra.js";
import type {ChatMessage, ImageData} from "../../types.js";
import type {LlmSession} from "../../evaluator/LlmSession/LlmSession.js";
import {printInfoLine} from "../utils/printInfoLine.js";
import {readImageFiles} from "../utils/readImageFiles.js";
import {formatProgressStatus} from "../utils/formatProgressStatus.js";

type ChatCommand = {
    modelPath?: string,
    mmproj?: string,
    image?: string[],
    bindingPath?: string,
    systemPrompt: string,
    prompt?: string,
    chatTemplateFile?: string,
    contextSize: number,
    batchSize: number,
    threads: number,
    gpuLayers: number,
    mmprojGpu: boolean,
    temperature: number,
    topP: number,
    topK: number,
    minP: number,
    repeatPenalty: number,
    lastTokensRepeatPenalty: number,
    frequencyPenalty: number,
    presencePenalty: number,
    seed?: number,
    maxTokens: number,
    logLevel: LogLevel,
    printStats: boolean
};

export const ChatCommand: CommandModule<object, ChatCommand> = {
    command: "chat [modelPath]",
    describe: "Chat with a model, optionally passing images to a multimodal model",
    builder(yargs) {
        return yargs
            .option("modelPath", {
                alias: ["m", "model", "path"],
                type: "string",
                description: "Model file to use for the chat"
            })
            .option("mmproj", {
                type: "string",
                description: "Multimodal projector file to load alongside the model. Required for passing images"
            })
            .option("image", {
                alias: "i",
                type: "string",
                array: true,
                description: "Image file to attach to the first prompt. Can be passed multiple times"
            })
            .option("bindingPath", {
                alias: "binding",
                type: "string",
                description: "Path to the native engine module. Defaults to the LLM_SESSION_BINDING_PATH environment variable"
            })
            .option("systemPrompt", {
                alias: "s",
                type: "string",
                default: defaultChatSystemPrompt,
                description: "System prompt to use against the model"
            })
            .option("prompt", {
                alias: "p",
                type: "string",
                description: "Prompt to send to the model. When omitted, an interactive chat is started"
            })
            .option("chatTemplateFile", {
                type: "string",
                description: "Path to a Jinja chat template file to use instead of the model's chat template"
            })
            .option("contextSize", {
                alias: "c",
                type: "number",
                default: defaultSessionParams.contextSize,
                description: "Context size to use for the model context"
            })
            .option("batchSize", {
                alias: "b",
                type: "number",
                default: defaultSessionParams.batchSize,
                description: "Batch size to use for the model context"
            })
            .option("threads", {
                type: "number",
                default: defaultSessionParams.threads,
                description: "Number of threads to use for the evaluation of tokens"
            })
            .option("gpuLayers", {
                alias: "gl",
                type: "number",
                default: defaultSessionParams.gpuLayers,
                description: "Number of layers to store in VRAM"
            })
            .option("mmprojGpu", {
                type: "boolean",
                default: defaultSessionParams.mmprojUseGpu,
                description: "Run the multimodal projector on the GPU"
            })
            .option("temperature", {
                alias: "t",
                type: "number",
                default: defaultSamplingParams.temperature,
                description: "Temperature is a hyperparameter that controls the randomness of the generated text. Set to `0` for deterministic output"
            })
            .option("topP", {
                alias: "tp",
                type: "number",
                default: defaultSamplingParams.topP,
                description: "Only consider the smallest set of tokens whose cumulative probability exceeds this value. Set to `1` to disable"
            })
            .option("topK", {
                alias: "k",
                type: "number",
                default: defaultSamplingParams.topK,
                description: "Only consider the K most likely next tokens. Set to `0` to disable"
            })
            .option("minP", {
                alias: "mp",
                type: "number",
                default: defaultSamplingParams.minP,
                description: "Discard tokens whose probability is below this fraction of the most likely token's probability. Set to `0` to disable"
            })
            .option("repeatPenalty", {
                alias: "rp",
                type: "number",
                default: defaultSamplingParams.repeatPenalty,
                description: "Penalty to apply to repeated tokens. Set to `1` to disable"
            })
            .option("lastTokensRepeatPenalty", {
                alias: "rpn",
                type: "number",
                default: defaultSamplingParams.repeatLastN,
                description: "Number of recent tokens generated by the model to apply penalties to repetition of"
            })
            .option("frequencyPenalty", {
                alias: "rfp",
                type: "number",
                default: defaultSamplingParams.frequencyPenalty,
                description: "Penalize tokens proportionally to how often they already appeared"
            })
            .option("presencePenalty", {
                alias: "rpp",
                type: "number",
                default: defaultSamplingParams.presencePenalty,
                description: "Penalize tokens that already appeared, regardless of how often"
            })
            .option("seed", {
                type: "number",
                description: "Seed for the random draw of the next token. Omit for a random seed"
            })
            .option("maxTokens", {
                alias: "mt",
                type: "number",
                default: unlimitedTokens,
                description: "Maximum number of tokens to generate in responses. Set to `-1` to use the configured ceiling"
            })
            .option("logLevel", {
                type: "string",
                choices: LogLevelValues,
                default: LogLevel.warn,
                description: "Log level of the engine"
            })
            .option("printStats", {
                type: "boolean",
                default: true,
                description: "Print generation statistics and memory usage after each response"
            });
    },
    async handler({
        modelPath, mmproj, image, bindingPath, systemPrompt, prompt, chatTemplateFile, contextSize, batchSize, threads,
        gpuLayers, mmprojGpu, temperature, topP, topK, minP, repeatPenalty, lastTokensRepeatPenalty, frequencyPenalty,
        presencePenalty, seed, maxTokens, logLevel, printStats
    }) {
        try {
            await RunChat({
                modelPath, mmproj, image, bindingPath, systemPrompt, prompt, chatTemplateFile, contextSize, batchSize, threads,
                gpuLayers, mmprojGpu, temperature, topP, topK, minP, repeatPenalty, lastTokensRepeatPenalty, frequencyPenalty,
                presencePenalty, seed, maxTokens, logLevel, printStats
            });
        } catch (err) {
            await new Promise((accept) => setTimeout(accept, 0)); // wait for logs to finish printing
            console.error(err);
            process.exit(1);
        }
    }
};


async function RunChat({
    modelPath, mmproj, image: imagePaths = [], bindingPath, systemPrompt, prompt, chatTemplateFile, contextSize, batchSize,
    threads, gpuLayers, mmprojGpu, temperature, topP, topK, minP, repeatPenalty, lastTokensRepeatPenalty, frequencyPenalty,
    presencePenalty, seed, maxTokens, logLevel, printStats
}: ChatCommand) {
    if (modelPath == null || modelPath === "")
        throw new Error("A model path is required. Pass it as the first argument or with --modelPath");

    const chatTemplate = chatTemplateFile != null
        ? await fs.readFile(path.resolve(process.cwd(), chatTemplateFile), "utf8")
        : undefined;
    let pendingImages: ImageData[] = await readImageFiles(imagePaths);

    const runtime = getRuntime({bindingPath, logLevel});
    const session = runtime.createSession();

    await withOra({
        loading: chalk.blue("Loading model"),
        success: chalk.blue("Model loaded"),
        fail: chalk.blue("Failed to load model"),
        useStatusLogs: logLevel === LogLevel.debug
    }, async (setStatus) => {
        unwrapResult(
            await session.initialize({
                modelPath,
                mmprojPath: mmproj,
                contextSize,
                batchSize,
                threads,
                gpuLayers,
                mmprojUseGpu: mmprojGpu,
                chatTemplate,
                sampling: {
                    temperature,
                    topP,
                    topK,
                    minP,
                    repeatPenalty,
                    repeatLastN: lastTokensRepeatPenalty,
                    frequencyPenalty,
                    presencePenalty,
                    seed,
                    nPredict: maxTokens
                }
            }, (progress, stage) => setStatus(formatProgressStatus(progress, stage)))
        );
    });

    const modelInfo = unwrapResult(session.getModelInfo());
    printInfoLine({
        title: "Model",
        padTitle: "Model".length,
        info: [{
            title: "Name",
            value: modelInfo.name
        }, {
            title: "Parameters",
            value: modelInfo.parameterCount.toLocaleString("en-US")
        }, {
            title: "Train context size",
            value: String(modelInfo.contextSize)
        }, {
            title: "Capabilities",
            value: modelInfo.capabilities.join(", ")
        }]
    });

    const conversation: ChatMessage[] = [];
    if (systemPrompt !== "")
        conversation.push({role: "system", content: systemPrompt});

    async function getPrompt() {
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout
        });

        const res: string = await new Promise((accept) => rl.question(chalk.yellow("> "), accept));
        rl.close();

        return res;
    }

    try {
        let nextPrompt = prompt ?? null;
        const interactive = prompt == null;

        // eslint-disable-next-line no-constant-condition
        while (true) {
            const input = nextPrompt != null
                ? nextPrompt
                : await getPrompt();

            if (nextPrompt != null) {
                console.log(chalk.green("> ") + nextPrompt);
                nextPrompt = null;
            }

            if (input === ".exit")
                break;

            conversation.push({
                role: "user",
                content: input,
                images: pendingImages.length > 0
                    ? pendingImages
                    : undefined
            });
            pendingImages = [];

            const response = await generateResponse(session, conversation);
            if (response != null)
                conversation.push({role: "assistant", content: response});
            else
                conversation.pop();

            if (printStats)
                printGenerationStats(session);

            if (!interactive)
                break;
        }
    } finally {
        await session.teardown();
    }
}

async function generateResponse(session: LlmSession, conversation: readonly ChatMessage[]) {
    const cancellationToken = new CancellationToken();
    const onSigint = () => cancellationToken.cancel();

    process.once("SIGINT", onSigint);
    process.stdout.write(chalk.yellow("AI: "));

    const [startColor, endColor] = chalk.blue("MIDDLE").split("MIDDLE");

    process.stdout.write(startColor ?? "");
    try {
        const res = await session.generate(conversation, {
            cancellationToken,
            onToken(text) {
                process.stdout.write(text);
            }
        });
        process.stdout.write(endColor ?? "");
        console.log();

        if (res.ok)
            return res.value;

        if (res.error === SessionErrorCode.OperationCancelled)
            console.info(chalk.gray("Generation cancelled"));
        else {
            console.info(chalk.red(res.message));

            // recover, so the chat can continue
            await session.reset();
        }

        return null;
    } finally {
        process.off("SIGINT", onSigint);
    }
}

function printGenerationStats(session: LlmSession) {
    const stats = session.getGenerationStats();
    const memory = session.getMemoryInfo();

    if (stats.ok)
        printInfoLine({
            title: "Stats",
            padTitle: "Memory".length,
            info: [{
                title: "Tokens",
                value: String(stats.value.tokensGenerated)
            }, {
                title: "Tokens/s",
                value: String(stats.value.tokensPerSecond)
            }, {
                title: "Time",
                value: `${stats.value.timeElapsed.toFixed(2)}s`
            }]
        });

    if (memory.ok)
        printInfoLine({
            title: "Memory",
            padTitle: "Memory".length,
            info: [{
                title: "Model",
                value: `${memory.value.modelMemoryMB}MB`
            }, {
                title: "Context",
                value: `${memory.value.contextMemoryMB}MB`
            }, {
                title: "Total",
                value: `${memory.value.totalMemoryMB}MB`
            }, {
                title: "Available",
                value: `${memory.value.availableMemoryMB}MB`
            }]
        });
}
