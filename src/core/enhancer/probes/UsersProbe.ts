import { type Probe, type Strategy, firstAvailable, nonEmptyLines } from './Probe';
import type { UsersInfo } from '../types';

interface Sessions {
    users: string[];
    sessions: number;
}

function collectSessions(names: string[]): Sessions {
    return { users: [...new Set(names)], sessions: names.length };
}

/** First column of `who` output, one line per session. */
export function parseWho(output: string): Sessions {
    return collectSessions(nonEmptyLines(output).map(line => line.split(/\s+/)[0]));
}

/** `query user` lists sessions after a header row; the current one is marked with `>`. */
export function parseQueryUser(output: string): Sessions {
    return collectSessions(nonEmptyLines(output).slice(1).map(line => line.replace(/^>/, '').split(/\s+/)[0]));
}

/** Account names from `/etc/passwd`. */
export function parsePasswd(content: string): string[] {
    return nonEmptyLines(content)
        .filter(line => !line.startsWith('#'))
        .map(line => line.split(':')[0]);
}

/** Account names from Windows `net user`, laid out in columns between banner lines. */
export function parseNetUser(output: string): string[] {
    return nonEmptyLines(output)
        .filter(line => !line.startsWith('-') && !line.startsWith('User accounts') && !line.startsWith('The command'))
        .flatMap(line => line.split(/\s+/));
}

const sessionStrategies: Strategy<Sessions>[] = [
    {
        source: 'who',
        read: (host) => host.platform === 'win32' ? undefined : parseWho(host.run('who', []))
    },
    {
        source: 'query user',
        read: (host) => host.platform === 'win32' ? parseQueryUser(host.run('query', ['user'])) : undefined
    },
    {
        source: 'current process user',
        read: (host) => ({ users: [host.system.username()], sessions: 1 })
    }
];

const accountStrategies: Strategy<string[]>[] = [
    {
        source: '/etc/passwd',
        read: (host) => host.platform === 'win32' ? undefined : parsePasswd(host.readFile('/etc/passwd'))
    },
    {
        source: 'net user',
        read: (host) => host.platform === 'win32' ? parseNetUser(host.run('net', ['user'])) : undefined
    }
];

export const usersProbe: Probe<'users'> = {
    kind: 'users',
    label: 'users info',
    async collect(ctx): Promise<UsersInfo> {
        const sessions = await firstAvailable('logged in users', sessionStrategies, ctx);
        const systemUsers = await firstAvailable('system users', accountStrategies, ctx);

        return {
            loggedUsers: sessions?.users,
            loggedUsersCount: sessions?.users.length,
            systemUsers,
            systemUsersCount: systemUsers?.length,
            sessionsCount: sessions?.sessions
        };
    }
};
