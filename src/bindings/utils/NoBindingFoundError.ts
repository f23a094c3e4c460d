export class NoBindingFoundError extends Error {
    /** @internal */
    public constructor(message: string = "NoBindingFoundError", options?: ErrorOptions) {
        super(message, options);
        this.name = "NoBindingFoundError";
    }
}
