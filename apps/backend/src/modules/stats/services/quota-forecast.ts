import type { IQuotaForecastDay, QuotaForecast, QuotaTrendDirection } from '@tubepulse/types';

/**
 * Linear forecast of per-window quota usage.
 *
 * The baseline is the mean of `usage`; the trend is the mean of the last three
 * windows minus that baseline. Day `i` ahead is predicted as
 * `max(0, baseline + trend * i)`, rounded to a whole unit.
 *
 * @param usage - Units used per completed window, oldest first
 * @param limit - Units available per window
 * @param daysAhead - Number of windows to forecast
 */
export function forecastUsage(usage: readonly number[], limit: number, daysAhead: number): QuotaForecast {
    if (usage.length < 2) {
        return { status: 'insufficient-history', windows: usage.length };
    }

    const average = mean(usage);
    const recentAverage = mean(usage.slice(-3));
    const trend = recentAverage - average;

    const forecast: IQuotaForecastDay[] = [];
    for (let day = 1; day <= daysAhead; day += 1) {
        const predictedUsage = Math.round(Math.max(0, average + trend * day));
        forecast.push({
            day,
            predictedUsage,
            utilization: Math.round((predictedUsage / limit) * 1000) / 10
        });
    }

    return {
        status: 'ok',
        averageUsage: Math.round(average * 10) / 10,
        trend: direction(trend),
        forecast
    };
}

function mean(values: readonly number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function direction(trend: number): QuotaTrendDirection {
    if (trend > 0) {
        return 'increasing';
    }
    if (trend < 0) {
        return 'decreasing';
    }
    return 'stable';
}
