/**
 * Structured logging contract shared by every backend component.
 *
 * Components receive an `ILogger` through their constructor instead of importing
 * the process logger, which keeps them testable with a recording fake. The
 * production implementation wraps Pino, so structured context goes first and
 * the message second: `logger.warn({ entityId }, 'Snapshot write failed')`.
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry for failures that stop the process.
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level log entry.
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning-level log entry, typically for degraded but recovered paths
     * such as serving stale data.
     */
    warn(...args: readonly unknown[]): void;

    info(...args: readonly unknown[]): void;

    debug(...args: readonly unknown[]): void;

    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped logger that stamps every entry with the given bindings.
     *
     * @param bindings - Context merged into every entry, e.g. `{ module: 'quota' }`
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
