import { type Probe, attempt } from './Probe';
import type { TimeInfo } from '../types';
import { zonedParts } from '../sources/clock';

export const timeProbe: Probe<'time'> = {
    kind: 'time',
    label: 'time info',
    async collect(ctx): Promise<TimeInfo> {
        const now = ctx.host.now();
        const timeZone = await attempt('time zone', 'Intl', (host) => host.timeZone(), ctx);
        const p = zonedParts(now, timeZone);

        const weekday = p.weekday;
        const date = `${p.day} ${p.month} ${p.year}`;
        const time = `${p.hour}:${p.minute}:${p.second}`;
        const iso = now.toISOString();

        return {
            weekday,
            date,
            time,
            timeZone,
            full: `${weekday}, ${date} ${time} (${timeZone ?? 'local time'})`,
            utc: `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`,
            timestamp: Math.floor(now.getTime() / 1000)
        };
    }
};
