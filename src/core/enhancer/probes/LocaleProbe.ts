import { type Probe, type Strategy, firstAvailable, attempt } from './Probe';
import type { LocaleInfo } from '../types';

interface LocaleName {
    language?: string;
    encoding?: string;
}

const PORTABLE_LOCALES = ['C', 'POSIX'];

/**
 * `en_US.UTF-8@euro` → `{ language: 'en_US', encoding: 'UTF-8' }`.
 * The portable `C`/`POSIX` locales name no language; `C.UTF-8` still carries an encoding.
 */
export function parsePosixLocale(value: string): LocaleName | undefined {
    const [name, encoding] = value.split('@')[0].split('.');
    const language = name && !PORTABLE_LOCALES.includes(name) ? name : undefined;
    if (!language && !encoding) return undefined;
    return { language, encoding: encoding || undefined };
}

const localeNameStrategies: Strategy<LocaleName>[] = [
    {
        source: 'environment',
        read: (host) => {
            const value = host.env.LC_ALL || host.env.LC_CTYPE || host.env.LANG;
            return value ? parsePosixLocale(value) : undefined;
        }
    },
    {
        source: 'Intl',
        read: () => ({ language: Intl.DateTimeFormat().resolvedOptions().locale.replace('-', '_') })
    }
];

function toBcp47(language: string | undefined): string {
    if (!language) return 'en-US';
    const tag = language.replace('_', '-');
    try {
        return Intl.DateTimeFormat.supportedLocalesOf([tag]).length > 0 ? tag : 'en-US';
    } catch {
        // Not a well-formed language tag.
        return 'en-US';
    }
}

export const localeProbe: Probe<'locale'> = {
    kind: 'locale',
    label: 'locale info',
    async collect(ctx): Promise<LocaleInfo> {
        const name = await firstAvailable('locale', localeNameStrategies, ctx);
        const currency = await attempt('currency symbol', 'locale -k', (host) => {
            if (host.platform === 'win32') return undefined;
            const match = host.run('locale', ['-k', 'currency_symbol']).match(/currency_symbol="([^"]*)"/);
            return match?.[1] || undefined;
        }, ctx);

        const tag = toBcp47(name?.language);
        const timeZone = await attempt('time zone', 'Intl', (host) => host.timeZone(), ctx);
        const formats = await attempt('date formats', 'Intl', (host) => {
            const now = host.now();
            return {
                time: now.toLocaleTimeString(tag, { timeZone }),
                date: now.toLocaleDateString(tag, { timeZone })
            };
        }, ctx);

        return {
            language: name?.language ?? 'Unknown',
            encoding: name?.encoding ?? 'Unknown',
            currency: currency ?? 'Unknown',
            timeFormat: formats?.time ?? 'Unknown',
            dateFormat: formats?.date ?? 'Unknown'
        };
    }
};
