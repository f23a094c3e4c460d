type ResourceRelease = () => void | Promise<void>;

/**
 * Tracks acquired resources and releases them in the reverse order of their acquisition
 */
export class ResourceStack {
    /** @internal */ private readonly _resources: Array<{name: string, release: ResourceRelease}> = [];

    public push(name: string, release: ResourceRelease) {
        this._resources.push({name, release});
    }

    public get empty() {
        return this._resources.length === 0;
    }

    public get size() {
        return this._resources.length;
    }

    /**
     * Names of the held resources, in acquisition order
     */
    public get names(): readonly string[] {
        return this._resources.map((resource) => resource.name);
    }

    /**
     * Release every held resource, last acquired first.
     * A release that throws is reported to `onReleaseError` and the remaining resources are still released.
     */
    public async releaseAll(onReleaseError: (name: string, error: unknown) => void) {
        while (this._resources.length > 0) {
            const resource = this._resources.pop();
            if (resource == null)
                break;

            try {
                await resource.release();
            } catch (err) {
                onReleaseError(resource.name, err);
            }
        }
    }
}
