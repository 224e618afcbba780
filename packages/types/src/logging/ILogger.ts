/**
 * Structured logging contract used by every backend service.
 *
 * Services receive an `ILogger` through their constructor instead of importing
 * the process logger, so tests can pass a spy and modules can hand out child
 * loggers bound to their own id. The backend implementation is Pino.
 */
export interface ILogger {
    /**
     * Unrecoverable failure; the process is about to stop.
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Failure that needs attention. Pass the error under an `error` key so
     * the stack survives serialisation.
     */
    error(...args: readonly unknown[]): void;

    warn(...args: readonly unknown[]): void;

    /**
     * Normal milestones: module started, record created.
     */
    info(...args: readonly unknown[]): void;

    debug(...args: readonly unknown[]): void;

    trace(...args: readonly unknown[]): void;

    /**
     * Create a logger that merges `bindings` into every entry.
     *
     * @param bindings - Static fields such as `{ module: 'hosts' }`
     * @param options - Implementation-specific options such as a level override
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
