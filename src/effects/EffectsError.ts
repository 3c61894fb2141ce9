export class EffectsError extends Error {
    constructor(readonly causes: Error[]) {
        super(causes.map(e => e.message).join('; '));
        this.name = 'EffectsError';
    }

    static fromThrown(...thrown: unknown[]): EffectsError {
        return new EffectsError(thrown.map(err => (err instanceof Error) ? err : new Error(String(err))));
    }
}
