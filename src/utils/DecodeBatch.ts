import type {EngineBatch} from "../bindings/EngineTypes.js";
import type {Token} from "../types.js";

/**
 * A reusable buffer of tokens to submit to the engine for evaluation in a single decode call
 */
export class DecodeBatch implements EngineBatch {
    public readonly tokens: Uint32Array;
    public readonly positions: Int32Array;
    public readonly logits: Uint8Array;
    /** @internal */ private _length: number = 0;

    public constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0)
            throw new RangeError(`Batch capacity must be a positive integer, got ${capacity}`);

        this.tokens = new Uint32Array(capacity);
        this.positions = new Int32Array(capacity);
        this.logits = new Uint8Array(capacity);
    }

    public get capacity() {
        return this.tokens.length;
    }

    public get length() {
        return this._length;
    }

    /**
     * Fill the batch with consecutive tokens starting at `startPosition`.
     * Only the last position has its logits computed.
     */
    public setTokens(tokens: ArrayLike<Token>, startPosition: number) {
        if (tokens.length > this.capacity)
            throw new RangeError(`Cannot fit ${tokens.length} tokens in a batch of ${this.capacity}`);

        for (let i = 0; i < tokens.length; i++) {
            this.tokens[i] = tokens[i];
            this.positions[i] = startPosition + i;
            this.logits[i] = 0;
        }

        if (tokens.length > 0)
            this.logits[tokens.length - 1] = 1;

        this._length = tokens.length;
    }

    public static forTokens(tokens: ArrayLike<Token>, startPosition: number) {
        const batch = new DecodeBatch(Math.max(1, tokens.length));
        batch.setTokens(tokens, startPosition);

        return batch;
    }
}
