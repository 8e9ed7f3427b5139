// src/stateMachine/AbstractStateMachine.ts

import type { ILogger } from '../@types/index.js';
import { StickerError } from '../errors/StickerError.js';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
}

/**
 * A state handler signals failure by returning the error; returning nothing moves on to the next state.
 */
export type StateHandler = () => Promise<StickerError | void> | StickerError | void;

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: StateHandler }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    public getState(): S {
        return this.state;
    }

    /**
     * Executes the transitions in `stateTransitions` in order. The first handler that returns or throws
     * an error moves the machine to its error state and hands the error to `handleError`; the remaining
     * handlers are skipped. Otherwise the machine ends in its completion state.
     *
     * @return {Promise<void>} Resolves once the machine is completed or has handled its error.
     */
    async run(): Promise<void> {
        for (const transition of this.stateTransitions) {
            this.transitionTo(transition.state);
            let failure: StickerError | void;
            try {
                failure = await transition.handler.bind(this)();
            } catch (error) {
                failure = StickerError.fromUnknown(error);
            }
            if (failure instanceof StickerError) {
                this.transitionTo(this.getErrorState(), failure);
                this.handleError(failure);
                return;
            }
        }
        this.transitionTo(this.getCompletionState());
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs it; every other transition is
     * logged at debug level when verbose.
     *
     * @param {S} nextState - The next state to transition to.
     * @param {StickerError} [error] - The error that caused a move to the error state.
     */
    protected transitionTo(nextState: S, error?: StickerError): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`${error.kind} during "${String(this.state)}": ${error.message}`);
        } else if (this.options.verbose) {
            logger.debug(`STATE :: Transitioning from state "${String(this.state)}" -> "${String(nextState)}"`);
        }
        this.state = nextState;
    }

    protected abstract handleError(error: StickerError): void;
    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
