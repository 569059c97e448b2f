import { DispatchError, PipelineStage } from '@wirecall/http-api';

export type InvocationState =
    | 'Received'
    | 'ConfigResolved'
    | 'RequestBuilt'
    | 'Sent'
    | 'ResponseReceived'
    | 'Completed'
    | 'Failed';

const TRANSITIONS: Record<InvocationState, readonly InvocationState[]> = {
    Received: ['ConfigResolved', 'Failed'],
    ConfigResolved: ['RequestBuilt', 'Failed'],
    RequestBuilt: ['Sent', 'Failed'],
    Sent: ['ResponseReceived', 'Failed'],
    ResponseReceived: ['Completed', 'Failed'],
    Completed: [],
    Failed: [],
};

/**
 * The stage whose work runs while the invocation sits in a state.
 */
const STAGE_OF: Record<InvocationState, PipelineStage> = {
    Received: 'resolve-config',
    ConfigResolved: 'build-request',
    RequestBuilt: 'send',
    Sent: 'send',
    ResponseReceived: 'map-response',
    Completed: 'map-response',
    Failed: 'map-response',
};

/**
 * Invocation - state of one call through the dispatch pipeline.
 *
 * Received → ConfigResolved → RequestBuilt → Sent → ResponseReceived → Completed,
 * with Failed reachable from every non-terminal state.
 */
export class Invocation {
    private current: InvocationState = 'Received';
    private sends = 0;
    readonly history: InvocationState[] = ['Received'];

    constructor(
        readonly contractName: string,
        readonly methodName: string,
    ) {}

    get state(): InvocationState {
        return this.current;
    }

    get stage(): PipelineStage {
        return STAGE_OF[this.current];
    }

    advance(next: InvocationState): void {
        if (!TRANSITIONS[this.current].includes(next)) {
            throw new DispatchError(
                `${this.contractName}.${this.methodName}: illegal transition ${this.current} -> ${next}`,
                this.stage,
            );
        }
        this.current = next;
        this.history.push(next);
    }

    /**
     * Moves to Sent. At most one request leaves per invocation.
     */
    markSent(): void {
        this.sends++;
        if (this.sends > 1) {
            throw new DispatchError(`${this.contractName}.${this.methodName}: a second request was about to be sent`, 'send');
        }
        this.advance('Sent');
    }

    /**
     * Moves to Failed and returns the error to raise: wirecall errors get the
     * stage stamped on, anything else is wrapped with the stage as context.
     */
    fail(error: Error): DispatchError {
        const stage = this.stage;
        if (this.current !== 'Completed' && this.current !== 'Failed') {
            this.advance('Failed');
        }
        if (error instanceof DispatchError) {
            if (error.stage === undefined) {
                error.stage = stage;
            }
            return error;
        }
        return new DispatchError(
            `${this.contractName}.${this.methodName} failed during ${stage}: ${error.message}`,
            stage,
            error,
        );
    }
}
