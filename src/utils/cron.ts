/**
 * Translate a fixed interval in seconds into a node-cron expression (six
 * fields, seconds first). Cron steps restart at the top of each minute, hour
 * or day, so only intervals that divide that unit evenly are accepted; every
 * other interval returns null.
 */
export function intervalToCron(seconds: number): string | null {
    if (!Number.isInteger(seconds) || seconds <= 0) return null;

    if (seconds < 60) {
        if (60 % seconds !== 0) return null;
        return seconds === 1 ? '* * * * * *' : `*/${seconds} * * * * *`;
    }
    if (seconds < 3600) {
        const minutes = seconds / 60;
        if (!Number.isInteger(minutes) || 60 % minutes !== 0) return null;
        return minutes === 1 ? '0 * * * * *' : `0 */${minutes} * * * *`;
    }
    if (seconds < 86_400) {
        const hours = seconds / 3600;
        if (!Number.isInteger(hours) || 24 % hours !== 0) return null;
        return hours === 1 ? '0 0 * * * *' : `0 0 */${hours} * * *`;
    }
    return null;
}

export const INTERVAL_RULE =
    'must divide a minute evenly (seconds below 60), an hour (whole minutes) or a day (whole hours)';
