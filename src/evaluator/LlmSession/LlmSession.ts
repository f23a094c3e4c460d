import os from "os";
import {EventRelay} from "lifecycle-utils";
import type {Template} from "@huggingface/jinja";
import {failure, failureFromUnknownError, Result, success} from "../../result/Result.js";
import {SessionErrorCode} from "../../result/SessionErrorCode.js";
import {LogLevel} from "../../bindings/types.js";
import {DecodeBatch} from "../../utils/DecodeBatch.js";
import {ResourceStack} from "../../utils/ResourceStack.js";
import {safeEventCallback} from "../../utils/safeEventCallback.js";
import {validateImageData} from "../../utils/validateImageData.js";
import {validateMmprojFile} from "../../utils/validateMmprojFile.js";
import {
    ChatMessage, GenerationState, GenerationStats, ImageData, MemoryInfo, ModelInfo, ProgressCallback, SessionState, TokenCallback
} from "../../types.js";
import {resolveSamplingParams, SamplingParams, validateSamplingParams} from "../SamplingParams.js";
import {compileChatTemplate, ResolvedSessionParams, resolveSessionParams, SessionParams, validateSessionParams} from "../SessionParams.js";
import {buildSamplerPipeline} from "../buildSamplerPipeline.js";
import type {CancellationCheck} from "../CancellationToken.js";
import type {LlmRuntime} from "../../bindings/LlmRuntime.js";
import type {
    EngineBitmap, EngineChunks, EngineContext, EngineModel, EngineSampler, EngineVision
} from "../../bindings/EngineTypes.js";
import {getMemoryInfo, getModelInfo} from "./utils/getModelInfo.js";
import {renderChatPrompt} from "./utils/renderChatPrompt.js";

export type LlmSessionGenerateOptions = {
    /**
     * Sampling parameters for this call only, merged over the session's default sampling parameters
     */
    sampling?: Partial<SamplingParams>,

    /**
     * Called with the text of every generated token.
     * The generation statistics are already updated when it's called.
     *
     * An error thrown from this callback fails the generation.
     */
    onToken?: TokenCallback,
    onProgress?: ProgressCallback,
    cancellationToken?: CancellationCheck
};

export type LlmSessionStateChange = {
    sessionState: SessionState,
    generationState: GenerationState
};

const activeGenerationStates: ReadonlySet<GenerationState> = new Set([
    GenerationState.initializing,
    GenerationState.tokenizingPrompt,
    GenerationState.processingImages,
    GenerationState.generating
]);

type GenerationResources = {
    model: EngineModel,
    context: EngineContext,
    batch: DecodeBatch,
    sampler: EngineSampler,
    vision: EngineVision | null,
    params: ResolvedSessionParams,
    sampling: SamplingParams,
    images: readonly ImageData[]
};

type ProgressReporter = (progress: number, stage: string, logStage?: boolean) => void;

export class LlmSession {
    /** @internal */ private readonly _runtime: LlmRuntime;
    /** @internal */ private readonly _resources = new ResourceStack();
    /** @internal */ private _params: ResolvedSessionParams | null = null;
    /** @internal */ private _chatTemplate: Template | undefined = undefined;
    /** @internal */ private _model: EngineModel | null = null;
    /** @internal */ private _context: EngineContext | null = null;
    /** @internal */ private _vision: EngineVision | null = null;
    /** @internal */ private _batch: DecodeBatch | null = null;
    /** @internal */ private _sampler: EngineSampler | null = null;
    /** @internal */ private _initialized: boolean = false;
    /** @internal */ private _sessionState: SessionState = SessionState.uninitialized;
    /** @internal */ private _generationState: GenerationState = GenerationState.idle;
    /** @internal */ private _stats: Omit<GenerationStats, "state"> | null = null;
    /** @internal */ private _stopRequested: boolean = false;
    /** @internal */ private _initializationPromise: Promise<Result<void>> | null = null;
    /** @internal */ private _generationPromise: Promise<Result<string>> | null = null;
    /** @internal */ private _teardownPromise: Promise<void> | null = null;

    public readonly onStateChange = new EventRelay<LlmSessionStateChange>();
    public readonly onDispose = new EventRelay<void>();

    /** @internal */
    public constructor({_runtime}: {
        _runtime: LlmRuntime
    }) {
        this._runtime = _runtime;

        this.teardown = this.teardown.bind(this);
        this.dispose = this.dispose.bind(this);
        this.free = this.free.bind(this);
    }

    public get sessionState() {
        return this._sessionState;
    }

    public get generationState() {
        return this._generationState;
    }

    /**
     * Whether the session completed its initialization and wasn't torn down since.
     * A session in the `error` state is still initialized.
     */
    public get initialized() {
        return this._initialized;
    }

    /**
     * The parameters the session was initialized with, or `null` when it's not initialized
     */
    public get params() {
        return this._params;
    }

    public get runtime() {
        return this._runtime;
    }

    /**
     * Load the model, its context and, when `mmprojPath` is set, the multimodal projector.
     *
     * Cancelling leaves the session in the `cancelled` state. Resources acquired before the cancellation
     * are kept until `teardown()` is called, and until then the session can't be initialized again.
     */
    public async initialize(
        params: SessionParams,
        onProgress?: ProgressCallback,
        cancellationToken?: CancellationCheck
    ): Promise<Result<void>> {
        if (this._initialized)
            return failure(SessionErrorCode.AlreadyInitialized);
        else if (this._initializationPromise != null)
            return failure(SessionErrorCode.AlreadyInitialized, "Session initialization is already in progress");
        else if (this._teardownPromise != null)
            return failure(SessionErrorCode.AlreadyInitialized, "Session is being torn down");
        else if (!this._resources.empty)
            return failure(
                SessionErrorCode.AlreadyInitialized,
                "Session holds resources from a cancelled initialization. Call teardown() first"
            );

        const initializationPromise = this._initializeSafely(params, onProgress, cancellationToken);
        this._initializationPromise = initializationPromise;

        try {
            return await initializationPromise;
        } finally {
            this._initializationPromise = null;
        }
    }

    /**
     * Generate a response to the conversation.
     *
     * Cancelling discards the partial response and leaves the session ready for another generation.
     * Any other failure puts the session in the `error` state, from which `reset()` recovers.
     */
    public async generate(
        conversation: readonly ChatMessage[],
        {sampling, onToken, onProgress, cancellationToken}: LlmSessionGenerateOptions = {}
    ): Promise<Result<string>> {
        let preparation: Result<GenerationResources>;
        try {
            preparation = this._prepareGeneration(conversation, sampling);
        } catch (err) {
            return failureFromUnknownError(err);
        }

        if (!preparation.ok)
            return preparation;

        const resources = preparation.value;
        this._stats = {
            tokensGenerated: 0,
            tokensPerSecond: 0,
            timeElapsed: 0,
            sampling: resources.sampling
        };
        this._setGenerationState(GenerationState.initializing);

        const generationPromise = this._generateSafely(conversation, resources, {onToken, onProgress, cancellationToken});
        this._generationPromise = generationPromise;

        try {
            return await generationPromise;
        } finally {
            this._generationPromise = null;
        }
    }

    /**
     * Clear the context and return to the `ready` state, recovering from a failed generation
     */
    public async reset(): Promise<Result<void>> {
        const context = this._context;
        if (!this._initialized || context == null)
            return failure(SessionErrorCode.NotInitialized);

        if (this._isGenerationInProgress())
            return failure(SessionErrorCode.InvalidParameters, "Cannot reset while a generation is in progress");

        try {
            context.clearMemory();
        } catch (err) {
            return failureFromUnknownError(err);
        }

        this._setStates(SessionState.ready, GenerationState.idle);
        return success();
    }

    /**
     * Release every engine resource held by the session, in the reverse order of their acquisition.
     * A generation or an initialization in progress is stopped first.
     *
     * Never fails, and calling it more than once has no effect.
     */
    public async teardown(): Promise<void> {
        if (this._teardownPromise != null)
            return await this._teardownPromise;

        const teardownPromise = this._teardown();
        this._teardownPromise = teardownPromise;

        try {
            await teardownPromise;
        } finally {
            this._teardownPromise = null;
        }
    }

    /** Alias of `teardown()` */
    public async dispose() {
        await this.teardown();
    }

    /** Alias of `teardown()` */
    public async free() {
        await this.teardown();
    }

    /**
     * Metadata of the loaded model.
     * Also available in the `error` state, since the model stays loaded until `teardown()`
     */
    public getModelInfo(): Result<ModelInfo> {
        const model = this._model;
        if (!this._initialized || model == null)
            return failure(SessionErrorCode.NotInitialized);

        try {
            return success(getModelInfo(model, this._vision != null));
        } catch (err) {
            return failureFromUnknownError(err);
        }
    }

    /**
     * Memory used by the model and the context.
     * Like `getModelInfo()`, it answers in the `error` state as well
     */
    public getMemoryInfo(): Result<MemoryInfo> {
        const model = this._model;
        const context = this._context;
        if (!this._initialized || model == null || context == null)
            return failure(SessionErrorCode.NotInitialized);

        try {
            return success(getMemoryInfo(model, context, os.freemem()));
        } catch (err) {
            return failureFromUnknownError(err);
        }
    }

    /**
     * Statistics of the last generation, or of the current one while it's running
     */
    public getGenerationStats(): Result<GenerationStats> {
        const params = this._params;
        if (!this._initialized || params == null)
            return failure(SessionErrorCode.NotInitialized);

        const stats = this._stats ?? {
            tokensGenerated: 0,
            tokensPerSecond: 0,
            timeElapsed: 0,
            sampling: params.sampling
        };

        return success({
            ...stats,
            state: this._generationState,
            sampling: {...stats.sampling}
        });
    }

    /**
     * Check that a multimodal projector file exists and is a GGUF file, without loading it
     */
    public static async validateMmproj(mmprojPath: string): Promise<Result<void>> {
        return await validateMmprojFile(mmprojPath);
    }

    /**
     * Check that image data is non-trivial and in a supported format (PNG, JPEG or BMP)
     */
    public static validateImageData(image: ImageData): Result<Uint8Array> {
        return validateImageData(image.data);
    }

    /** @internal */
    private async _initializeSafely(
        params: SessionParams,
        onProgress: ProgressCallback | undefined,
        cancellationToken: CancellationCheck | undefined
    ): Promise<Result<void>> {
        try {
            return await this._initialize(params, onProgress, cancellationToken);
        } catch (err) {
            const res = failureFromUnknownError(err);
            await this._failInitialization(res.error, res.message);

            return res;
        }
    }

    /** @internal */
    private async _initialize(
        params: SessionParams,
        onProgress: ProgressCallback | undefined,
        cancellationToken: CancellationCheck | undefined
    ): Promise<Result<void>> {
        const resolvedParams = resolveSessionParams(params);
        const validation = await validateSessionParams(resolvedParams);
        if (!validation.ok)
            return validation;

        let chatTemplate: Template | undefined = undefined;
        if (resolvedParams.chatTemplate != null) {
            const templateRes = compileChatTemplate(resolvedParams.chatTemplate);
            if (!templateRes.ok)
                return templateRes;

            chatTemplate = templateRes.value;
        }

        const isCancelled = () => this._stopRequested || cancellationToken?.isCancelled() === true;
        const reportProgress = this._createProgressReporter(onProgress);
        const bindings = this._runtime._bindings;

        this._setSessionState(SessionState.initializing);
        reportProgress(0, "Initializing backend");

        if (isCancelled())
            return this._cancelInitialization();

        const backend = this._runtime._acquireBackend();
        this._resources.push("backend", () => backend.dispose());

        this._batch = new DecodeBatch(resolvedParams.batchSize);
        this._resources.push("batch", () => {
            this._batch = null;
        });

        reportProgress(0.1, "Loading model");
        const model = await bindings.loadModel(resolvedParams.modelPath, {
            gpuLayers: resolvedParams.gpuLayers,
            onLoadProgress: (loadProgress) => {
                reportProgress(0.1 + 0.3 * Math.max(0, Math.min(1, loadProgress)), "Loading model", false);
            }
        });
        if (model == null)
            return await this._failInitialization(
                SessionErrorCode.ModelLoadFailed,
                `Failed to load model from: ${resolvedParams.modelPath}`
            );

        this._model = model;
        this._resources.push("model", () => {
            this._model = null;
            model.dispose();
        });

        if (isCancelled())
            return this._cancelInitialization();

        reportProgress(0.4, "Initializing context");
        const context = await model.initContext({
            contextSize: resolvedParams.contextSize,
            batchSize: resolvedParams.batchSize,
            threads: resolvedParams.threads
        });
        if (context == null)
            return await this._failInitialization(SessionErrorCode.ContextInitFailed, "Failed to initialize context");

        this._context = context;
        this._resources.push("context", () => {
            this._context = null;
            context.dispose();
        });

        reportProgress(0.6, "Model loaded successfully");

        if (resolvedParams.mmprojPath != null) {
            reportProgress(0.7, "Loading vision model");

            if (bindings.initVision == null)
                return await this._failInitialization(
                    SessionErrorCode.MmprojLoadFailed,
                    "The engine binding was built without multimodal support"
                );

            const vision = await bindings.initVision(resolvedParams.mmprojPath, model, {
                useGpu: resolvedParams.mmprojUseGpu,
                threads: resolvedParams.threads,
                verbosity: resolvedParams.verbosity > 1
                    ? "debug"
                    : "info"
            });
            if (vision == null)
                return await this._failInitialization(
                    SessionErrorCode.MmprojLoadFailed,
                    `Failed to load multimodal projector from: ${resolvedParams.mmprojPath}`
                );

            this._vision = vision;
            this._resources.push("vision", () => {
                this._vision = null;
                vision.dispose();
            });

            if (isCancelled())
                return this._cancelInitialization();

            reportProgress(0.9, "Vision model loaded successfully");
        }

        this._params = resolvedParams;
        this._chatTemplate = chatTemplate;
        this._stats = null;
        this._initialized = true;
        this._setStates(SessionState.ready, GenerationState.idle);
        reportProgress(1, "Initialization complete");

        return success();
    }

    /** @internal */
    private _cancelInitialization(): Result<void> {
        this._runtime._log(LogLevel.debug, "Session initialization was cancelled");
        this._setSessionState(SessionState.cancelled);

        return failure(SessionErrorCode.OperationCancelled);
    }

    /** @internal */
    private async _failInitialization(error: SessionErrorCode, message: string): Promise<Result<void>> {
        this._runtime._log(LogLevel.warn, `Session initialization failed: ${message}`);
        await this._releaseResources();
        this._setSessionState(SessionState.error);

        return failure(error, message);
    }

    /**
     * Check every precondition of a generation and configure the sampler.
     * Runs synchronously, so a concurrent call sees the generation state this one sets right after.
     * @internal
     */
    private _prepareGeneration(
        conversation: readonly ChatMessage[],
        samplingOverride: Partial<SamplingParams> | undefined
    ): Result<GenerationResources> {
        const model = this._model;
        const context = this._context;
        const batch = this._batch;
        const params = this._params;

        if (!this._initialized || model == null || context == null || batch == null || params == null)
            return failure(SessionErrorCode.NotInitialized, "Session must be initialized before use");
        else if (this._sessionState === SessionState.error)
            return failure(SessionErrorCode.NotInitialized, "Session is in an error state. Call reset() to recover");
        else if (this._isGenerationInProgress())
            return failure(SessionErrorCode.InvalidParameters, "Generation already in progress");
        else if (conversation.length === 0)
            return failure(SessionErrorCode.InvalidParameters, "Conversation cannot be empty");

        const sampling = resolveSamplingParams(params.sampling, samplingOverride);
        const samplingValidation = validateSamplingParams(sampling);
        if (!samplingValidation.ok)
            return samplingValidation;

        const images = conversation.flatMap((message) => message.images ?? []);
        for (const image of images) {
            const imageValidation = validateImageData(image.data);
            if (!imageValidation.ok)
                return imageValidation;
        }

        if (images.length > 0 && this._vision == null)
            return failure(SessionErrorCode.InvalidParameters, "Images provided but multimodal projector not loaded");

        const samplerRes = this._configureSampler(model, sampling);
        if (!samplerRes.ok)
            return samplerRes;

        return success({
            model,
            context,
            batch,
            sampler: samplerRes.value,
            vision: this._vision,
            params,
            sampling,
            images
        });
    }

    /** @internal */
    private _configureSampler(model: EngineModel, sampling: SamplingParams): Result<EngineSampler> {
        if (this._sampler != null) {
            const previousSampler = this._sampler;
            this._sampler = null;
            previousSampler.dispose();
        }

        const sampler = model.createSampler(buildSamplerPipeline(sampling));
        if (sampler == null)
            return failure(SessionErrorCode.SamplingFailed, "Failed to create sampler chain");

        this._sampler = sampler;
        return success(sampler);
    }

    /** @internal */
    private async _generateSafely(
        conversation: readonly ChatMessage[],
        resources: GenerationResources,
        {onToken, onProgress, cancellationToken}: Pick<LlmSessionGenerateOptions, "onToken" | "onProgress" | "cancellationToken">
    ): Promise<Result<string>> {
        const reportProgress = this._createProgressReporter(onProgress);
        const isCancelled = () => this._stopRequested || cancellationToken?.isCancelled() === true;

        let res: Result<string>;
        try {
            res = await this._generate(conversation, resources, {onToken, reportProgress, isCancelled});
        } catch (err) {
            res = failureFromUnknownError(err);
        }

        if (res.ok) {
            this._setGenerationState(GenerationState.finished);
            reportProgress(1, "Generation complete");
        } else if (res.error === SessionErrorCode.OperationCancelled) {
            this._runtime._log(LogLevel.debug, "Generation was cancelled");
            this._setGenerationState(GenerationState.cancelled);
        } else {
            this._runtime._log(LogLevel.warn, `Generation failed: ${res.message}`);
            this._setStates(SessionState.error, GenerationState.error);
        }

        return res;
    }

    /** @internal */
    private async _generate(
        conversation: readonly ChatMessage[],
        {model, context, batch, sampler, vision, params, sampling, images}: GenerationResources,
        {onToken, reportProgress, isCancelled}: {
            onToken: TokenCallback | undefined,
            reportProgress: ProgressReporter,
            isCancelled(): boolean
        }
    ): Promise<Result<string>> {
        const startTime = performance.now();

        context.clearMemory();

        this._setGenerationState(GenerationState.tokenizingPrompt);
        const promptRes = renderChatPrompt({
            model,
            conversation,
            chatTemplate: this._chatTemplate,
            maxLength: params.contextSize
        });
        if (!promptRes.ok)
            return promptRes;

        if (isCancelled())
            return failure(SessionErrorCode.OperationCancelled);

        const positionRes = (images.length > 0 && vision != null)
            ? await this._evaluateMultimodalPrompt(promptRes.value, {vision, context, params, images, reportProgress, isCancelled})
            : await this._evaluateTextPrompt(promptRes.value, {model, context, reportProgress, isCancelled});
        if (!positionRes.ok)
            return positionRes;

        if (isCancelled())
            return failure(SessionErrorCode.OperationCancelled);

        this._setGenerationState(GenerationState.generating);
        reportProgress(0.6, "Generating response");

        const maxTokens = sampling.nPredict > 0
            ? sampling.nPredict
            : params.maxTokensCeiling;
        let position = positionRes.value;
        let text = "";
        let tokensGenerated = 0;

        while (tokensGenerated < maxTokens) {
            if (isCancelled())
                return failure(SessionErrorCode.OperationCancelled);

            const token = sampler.sample(context);
            if (token == null)
                return failure(SessionErrorCode.SamplingFailed, "Sampler returned null token");

            sampler.accept(token);

            if (model.isEogToken(token))
                break;

            const tokenText = model.tokenToText(token);
            text += tokenText;
            tokensGenerated++;

            this._updateStats(tokensGenerated, startTime);
            onToken?.(tokenText);

            batch.setTokens([token], position);
            position++;

            if (!(await context.decode(batch)))
                return failure(SessionErrorCode.EvaluationFailed, "Failed to decode token");

            if (sampling.nPredict > 0)
                reportProgress(0.6 + 0.4 * tokensGenerated / maxTokens, "Generating tokens");
        }

        return success(text);
    }

    /** @internal */
    private async _evaluateTextPrompt(prompt: string, {model, context, reportProgress, isCancelled}: {
        model: EngineModel,
        context: EngineContext,
        reportProgress: ProgressReporter,
        isCancelled(): boolean
    }): Promise<Result<number>> {
        reportProgress(0.2, "Tokenizing text prompt");

        // the chat template already adds the special tokens the model expects
        const tokens = model.tokenize(prompt, false, true);
        if (tokens == null || tokens.length === 0)
            return failure(SessionErrorCode.TokenizationFailed, "Failed to tokenize text prompt");

        if (isCancelled())
            return failure(SessionErrorCode.OperationCancelled);

        reportProgress(0.4, "Evaluating text prompt");
        if (!(await context.decode(DecodeBatch.forTokens(tokens, 0))))
            return failure(SessionErrorCode.EvaluationFailed, "Failed to evaluate text prompt");

        return success(tokens.length);
    }

    /** @internal */
    private async _evaluateMultimodalPrompt(prompt: string, {vision, context, params, images, reportProgress, isCancelled}: {
        vision: EngineVision,
        context: EngineContext,
        params: ResolvedSessionParams,
        images: readonly ImageData[],
        reportProgress: ProgressReporter,
        isCancelled(): boolean
    }): Promise<Result<number>> {
        this._setGenerationState(GenerationState.processingImages);
        reportProgress(0.1, "Processing images");

        const markedPrompt = vision.defaultImageMarker().repeat(images.length) + "\n" + prompt;
        const bitmaps: EngineBitmap[] = [];
        let chunks: EngineChunks | null = null;

        try {
            for (const image of images) {
                const bitmap = vision.bitmapFromBytes(image.data);
                if (bitmap == null)
                    return failure(SessionErrorCode.ImageProcessingFailed, "Failed to create bitmap from image data");

                bitmaps.push(bitmap);
            }

            this._setGenerationState(GenerationState.tokenizingPrompt);
            reportProgress(0.3, "Tokenizing multimodal prompt");

            chunks = vision.tokenizeMixed(markedPrompt, bitmaps, {addSpecial: true, parseSpecial: true});
            if (chunks == null)
                return failure(SessionErrorCode.TokenizationFailed, "Failed to tokenize multimodal input");

            if (isCancelled())
                return failure(SessionErrorCode.OperationCancelled);

            reportProgress(0.5, "Evaluating multimodal prompt");
            const position = await vision.evaluateChunks(context, chunks, 0, params.batchSize);
            if (position == null)
                return failure(SessionErrorCode.EvaluationFailed, "Failed to evaluate multimodal prompt");

            return success(position);
        } finally {
            chunks?.dispose();

            for (const bitmap of bitmaps.reverse())
                bitmap.dispose();
        }
    }

    /** @internal */
    private _updateStats(tokensGenerated: number, startTime: number) {
        if (this._stats == null)
            return;

        const timeElapsed = (performance.now() - startTime) / 1000;

        this._stats = {
            ...this._stats,
            tokensGenerated,
            timeElapsed,
            tokensPerSecond: timeElapsed > 0
                ? Math.floor(tokensGenerated / timeElapsed)
                : 0
        };
    }

    /** @internal */
    private async _teardown() {
        if (this._initializationPromise != null || this._generationPromise != null) {
            this._stopRequested = true;

            await this._initializationPromise;
            await this._generationPromise;
        }

        const hadResources = !this._resources.empty || this._sampler != null;

        this._initialized = false;
        await this._releaseResources();

        this._params = null;
        this._chatTemplate = undefined;
        this._stats = null;
        this._stopRequested = false;
        this._setStates(SessionState.uninitialized, GenerationState.idle);

        if (hadResources)
            this.onDispose.dispatchEvent();
    }

    /** @internal */
    private async _releaseResources() {
        if (this._sampler != null) {
            const sampler = this._sampler;
            this._sampler = null;

            try {
                sampler.dispose();
            } catch (err) {
                this._runtime._log(LogLevel.error, `Failed to release the sampler: ${String(err)}`);
            }
        }

        await this._resources.releaseAll((name, err) => {
            this._runtime._log(LogLevel.error, `Failed to release the ${name}: ${String(err)}`);
        });
    }

    /** @internal */
    private _isGenerationInProgress() {
        return this._generationPromise != null || activeGenerationStates.has(this._generationState);
    }

    /** @internal */
    private _createProgressReporter(onProgress: ProgressCallback | undefined): ProgressReporter {
        const safeOnProgress = safeEventCallback(onProgress, (err) => {
            this._runtime._log(LogLevel.warn, `Progress callback threw an error: ${String(err)}`);
        });

        return (progress, stage, logStage = true) => {
            if (logStage)
                this._runtime._log(LogLevel.debug, `${stage} (${Math.round(progress * 100)}%)`);

            safeOnProgress(progress, stage);
        };
    }

    /** @internal */
    private _setSessionState(sessionState: SessionState) {
        this._setStates(sessionState, this._generationState);
    }

    /** @internal */
    private _setGenerationState(generationState: GenerationState) {
        this._setStates(this._sessionState, generationState);
    }

    /** @internal */
    private _setStates(sessionState: SessionState, generationState: GenerationState) {
        if (sessionState === this._sessionState && generationState === this._generationState)
            return;

        this._sessionState = sessionState;
        this._generationState = generationState;
        this.onStateChange.dispatchEvent({sessionState, generationState});
    }
}
