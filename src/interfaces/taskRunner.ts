/**
 * A pure function shipped to another thread as source text. It must be a
 * self-contained arrow or function expression: captured variables and imports
 * are not carried across.
 */
export type PureTask<I, O> = (input: I) => O | Promise<O>;

// Interface for offloading CPU-bound work away from the calling thread
export default interface TaskRunner {
    run<I, O>(task: PureTask<I, O>, input: I): Promise<O>;
    dispose(): Promise<void>;
}
