/**
 * Usage of the current upstream quota window.
 */
export interface IQuotaStatus {
    windowStart: Date;
    windowEnd: Date;
    used: number;
    limit: number;
    remaining: number;
}

/**
 * Persisted usage of one past or current window.
 */
export interface IQuotaWindow {
    windowStart: Date;
    windowEnd: Date;
    callCount: number;
    limit: number;
}

export interface IQuotaForecastDay {
    /** Days ahead of the current window, starting at 1. */
    day: number;
    predictedUsage: number;
    /** Predicted usage as a percentage of the limit, one decimal. */
    utilization: number;
}

export type QuotaTrendDirection = 'increasing' | 'decreasing' | 'stable';

export type QuotaForecast =
    | { status: 'insufficient-history'; windows: number }
    | {
        status: 'ok';
        averageUsage: number;
        trend: QuotaTrendDirection;
        forecast: IQuotaForecastDay[];
    };

/**
 * Counter of upstream calls inside a fixed, wall-clock-aligned window.
 */
export interface IQuotaTracker {
    /**
     * Reserve `n` units in the current window.
     *
     * @returns true when reserved; false when the reservation would exceed the limit
     */
    tryAcquire(n?: number): Promise<boolean>;

    remaining(): Promise<IQuotaStatus>;

    history(windows: number): Promise<IQuotaWindow[]>;

    forecast(daysAhead: number): Promise<QuotaForecast>;
}
