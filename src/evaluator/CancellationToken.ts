/**
 * Anything that can be polled for cancellation
 */
export type CancellationCheck = {
    isCancelled(): boolean
};

const cancelledFlag = 1;
const activeFlag = 0;

/**
 * A cancellation flag that long-running session operations poll at well-defined checkpoints.
 *
 * The flag is stored in a `SharedArrayBuffer` and accessed with `Atomics`,
 * so a token can be recreated on another thread from its `sharedBuffer` and cancelled from there.
 * @example
 * ```typescript
 * const cancellationToken = new CancellationToken();
 * setTimeout(() => cancellationToken.cancel(), 10_000);
 *
 * const res = await session.generate(conversation, {cancellationToken});
 * ```
 */
export class CancellationToken implements CancellationCheck {
    public readonly sharedBuffer: SharedArrayBuffer;
    /** @internal */ private readonly _flag: Int32Array;

    public constructor(sharedBuffer?: SharedArrayBuffer) {
        this.sharedBuffer = sharedBuffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
        this._flag = new Int32Array(this.sharedBuffer, 0, 1);

        this.cancel = this.cancel.bind(this);
        this.isCancelled = this.isCancelled.bind(this);
    }

    public cancel() {
        Atomics.store(this._flag, 0, cancelledFlag);
    }

    /**
     * Clear the flag so the token can be reused for another call
     */
    public reset() {
        Atomics.store(this._flag, 0, activeFlag);
    }

    public isCancelled() {
        return Atomics.load(this._flag, 0) === cancelledFlag;
    }

    /**
     * Create a token that gets cancelled when the given signal is aborted
     */
    public static fromAbortSignal(signal: AbortSignal) {
        const token = new CancellationToken();

        if (signal.aborted)
            token.cancel();
        else
            signal.addEventListener("abort", token.cancel, {once: true});

        return token;
    }
}
