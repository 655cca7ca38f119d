export interface ZonedParts {
    weekday: string;
    day: string;
    month: string;
    monthNumber: string;
    year: string;
    hour: string;
    minute: string;
    second: string;
}

function pick(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
    return parts.find(part => part.type === type)?.value ?? '';
}

/**
 * Wall-clock fields of `date` in `timeZone` (the runtime zone when omitted),
 * with English names and zero-padded numbers.
 */
export function zonedParts(date: Date, timeZone?: string): ZonedParts {
    const named = new Intl.DateTimeFormat('en-US', {
        timeZone,
        weekday: 'long',
        month: 'long'
    }).formatToParts(date);
    const numeric = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23'
    }).formatToParts(date);

    return {
        weekday: pick(named, 'weekday'),
        month: pick(named, 'month'),
        day: pick(numeric, 'day'),
        monthNumber: pick(numeric, 'month'),
        year: pick(numeric, 'year'),
        hour: pick(numeric, 'hour'),
        minute: pick(numeric, 'minute'),
        second: pick(numeric, 'second')
    };
}

/** `YYYY-MM-DD HH:MM:SS` in the given zone. */
export function formatDateTime(date: Date, timeZone?: string): string {
    const p = zonedParts(date, timeZone);
    return `${p.year}-${p.monthNumber}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}

/** Minutes east of UTC that `timeZone` observes at `date`. */
export function utcOffsetMinutes(date: Date, timeZone?: string): number {
    const p = zonedParts(date, timeZone);
    const wallClockAsUtc = Date.UTC(
        Number(p.year),
        Number(p.monthNumber) - 1,
        Number(p.day),
        Number(p.hour),
        Number(p.minute),
        Number(p.second)
    );
    const instant = Math.floor(date.getTime() / 1000) * 1000;
    return Math.round((wallClockAsUtc - instant) / 60000);
}
