import { type Probe, attempt, round2 } from './Probe';
import type { TimezoneInfo } from '../types';
import { utcOffsetMinutes } from '../sources/clock';

/** `+1 hours`, `-5.5 hours`, `+0 hours` */
export function formatUtcOffset(minutes: number): string {
    const hours = round2(minutes / 60);
    return `${hours >= 0 ? '+' : ''}${hours} hours`;
}

/**
 * Daylight saving is in effect when the current offset is ahead of the
 * zone's standard (smaller of January and July) offset.
 */
export function isDstActive(date: Date, timeZone?: string): boolean {
    const year = date.getUTCFullYear();
    const january = utcOffsetMinutes(new Date(Date.UTC(year, 0, 1)), timeZone);
    const july = utcOffsetMinutes(new Date(Date.UTC(year, 6, 1)), timeZone);
    if (january === july) return false;
    return utcOffsetMinutes(date, timeZone) > Math.min(january, july);
}

export const timezoneProbe: Probe<'timezone'> = {
    kind: 'timezone',
    label: 'timezone info',
    async collect(ctx): Promise<TimezoneInfo> {
        const now = ctx.host.now();
        const current = await attempt('time zone', 'Intl', (host) => host.timeZone(), ctx);
        const examples = await attempt('time zone list', 'Intl.supportedValuesOf', () =>
            Intl.supportedValuesOf('timeZone').slice(0, 5), ctx);

        return {
            current,
            utcOffset: formatUtcOffset(utcOffsetMinutes(now, current)),
            dstActive: isDstActive(now, current),
            examples
        };
    }
};
