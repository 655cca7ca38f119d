import { type Probe, type Strategy, firstAvailable, attempt, nonEmptyLines } from './Probe';
import type { PortsInfo } from '../types';
import type { HostFacilities } from '../HostFacilities';
import { processTableStrategies } from '../sources/processTable';

export interface Connection {
    localPort: number;
    /** `LISTEN`, `ESTABLISHED`, ... ; `NONE` for connectionless sockets */
    status: string;
    /** Owning process name when the source could resolve it */
    process?: string;
}

// Kernel TCP states, see include/net/tcp_states.h
const TCP_STATES: Record<string, string> = {
    '01': 'ESTABLISHED',
    '02': 'SYN_SENT',
    '03': 'SYN_RECV',
    '04': 'FIN_WAIT1',
    '05': 'FIN_WAIT2',
    '06': 'TIME_WAIT',
    '07': 'CLOSE',
    '08': 'CLOSE_WAIT',
    '09': 'LAST_ACK',
    '0A': 'LISTEN',
    '0B': 'CLOSING'
};

const PROC_NET_TABLES = ['tcp', 'tcp6', 'udp', 'udp6'] as const;

/** Socket inode → owning process name, from `/proc/<pid>/fd` links. */
function socketOwners(host: HostFacilities): Map<string, string> {
    const owners = new Map<string, string>();
    for (const pid of host.readDir('/proc').filter(entry => /^\d+$/.test(entry))) {
        let fds: string[];
        let name: string;
        try {
            fds = host.readDir(`/proc/${pid}/fd`);
            name = host.readFile(`/proc/${pid}/comm`).trim();
        } catch {
            // Another user's process, or it exited while we were scanning.
            continue;
        }
        for (const fd of fds) {
            try {
                const inode = host.readLink(`/proc/${pid}/fd/${fd}`).match(/^socket:\[(\d+)\]$/)?.[1];
                if (inode) owners.set(inode, name);
            } catch {
                continue;
            }
        }
    }
    return owners;
}

/** Rows of one `/proc/net/{tcp,udp}[6]` table. */
export function parseProcNetTable(content: string, protocol: 'tcp' | 'udp', owners: Map<string, string>): Connection[] {
    const connections: Connection[] = [];
    for (const line of nonEmptyLines(content).slice(1)) {
        const cols = line.split(/\s+/);
        if (cols.length < 10) continue;
        const localPort = parseInt(cols[1].split(':').pop() ?? '', 16);
        if (Number.isNaN(localPort)) continue;
        connections.push({
            localPort,
            status: protocol === 'tcp' ? TCP_STATES[cols[3]] ?? cols[3] : 'NONE',
            process: owners.get(cols[9])
        });
    }
    return connections;
}

/** `ss -tunapH`: `tcp LISTEN 0 128 0.0.0.0:22 0.0.0.0:* users:(("sshd",pid=812,fd=3))` */
export function parseSsOutput(output: string): Connection[] {
    const connections: Connection[] = [];
    for (const line of nonEmptyLines(output)) {
        const cols = line.split(/\s+/);
        if (cols.length < 6) continue;
        const localPort = Number(cols[4].split(':').pop());
        if (!Number.isInteger(localPort)) continue;
        const state = cols[1] === 'ESTAB' ? 'ESTABLISHED' : cols[1] === 'UNCONN' ? 'NONE' : cols[1];
        connections.push({
            localPort,
            status: state,
            process: line.match(/users:\(\("([^"]+)"/)?.[1]
        });
    }
    return connections;
}

/** Windows `netstat -ano`; UDP rows have no state column. */
export function parseNetstatAno(output: string, namesByPid: Map<number, string>): Connection[] {
    const connections: Connection[] = [];
    for (const line of nonEmptyLines(output)) {
        const cols = line.split(/\s+/);
        const protocol = cols[0]?.toUpperCase();
        if (protocol !== 'TCP' && protocol !== 'UDP') continue;
        const localPort = Number(cols[1]?.split(':').pop());
        if (!Number.isInteger(localPort)) continue;
        const state = protocol === 'TCP' ? cols[3] : 'NONE';
        const pid = Number(cols[cols.length - 1]);
        connections.push({
            localPort,
            status: state === 'LISTENING' ? 'LISTEN' : state,
            process: pid > 0 ? namesByPid.get(pid) : undefined
        });
    }
    return connections;
}

/** macOS `lsof -nP -iTCP -iUDP`: `COMMAND PID USER FD TYPE DEVICE SIZE/OFF NODE NAME`. */
export function parseLsofOutput(output: string): Connection[] {
    const connections: Connection[] = [];
    for (const line of nonEmptyLines(output).slice(1)) {
        const match = line.match(/^(\S+)\s+\d+.*\s(TCP|UDP)\s+(\S+?)(?:->\S+)?(?:\s+\((\w+)\))?$/);
        if (!match) continue;
        const localPort = Number(match[3].split(':').pop());
        if (!Number.isInteger(localPort)) continue;
        connections.push({
            localPort,
            status: match[4] ?? 'NONE',
            process: match[1]
        });
    }
    return connections;
}

/** Linux `netstat -tuln`: listening sockets only, local address in the fourth column. */
export function parseNetstatListening(output: string): number[] {
    const ports: number[] = [];
    for (const line of nonEmptyLines(output)) {
        if (!line.includes('LISTEN')) continue;
        const parts = line.split(/\s+/);
        if (parts.length < 4) continue;
        const port = Number(parts[3].split(':').pop());
        if (Number.isInteger(port) && !ports.includes(port)) ports.push(port);
    }
    return ports;
}

const connectionStrategies: Strategy<Connection[]>[] = [
    {
        source: '/proc/net',
        read: (host) => {
            if (host.platform !== 'linux') return undefined;
            const tables: { protocol: 'tcp' | 'udp'; content: string }[] = [];
            for (const table of PROC_NET_TABLES) {
                try {
                    tables.push({ protocol: table.startsWith('tcp') ? 'tcp' : 'udp', content: host.readFile(`/proc/net/${table}`) });
                } catch {
                    // IPv6 tables are absent when the kernel has IPv6 disabled.
                    continue;
                }
            }
            if (tables.length === 0) return undefined;
            const owners = socketOwners(host);
            return tables.flatMap(({ protocol, content }) => parseProcNetTable(content, protocol, owners));
        }
    },
    {
        source: 'ss',
        read: (host) => host.platform === 'linux' ? parseSsOutput(host.run('ss', ['-tunapH'])) : undefined
    },
    {
        source: 'lsof',
        read: (host) => host.platform === 'darwin' ? parseLsofOutput(host.run('lsof', ['-nP', '-iTCP', '-iUDP'])) : undefined
    },
    {
        source: 'netstat -ano',
        read: async (host) => {
            if (host.platform !== 'win32') return undefined;
            const namesByPid = new Map<number, string>();
            for (const strategy of processTableStrategies) {
                try {
                    for (const row of (await strategy.read(host)) ?? []) namesByPid.set(row.pid, row.name);
                } catch {
                    // Without tasklist the connections are still counted, just unattributed.
                    continue;
                }
            }
            return parseNetstatAno(host.run('netstat', ['-ano']), namesByPid);
        }
    }
];

/** `name (count)` for every owning process, most connections first. */
export function rankProcesses(connections: Connection[]): string[] {
    const counts = new Map<string, number>();
    for (const connection of connections) {
        if (connection.process) counts.set(connection.process, (counts.get(connection.process) ?? 0) + 1);
    }
    return [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .map(([name, count]) => `${name} (${count})`);
}

export const portsProbe: Probe<'ports'> = {
    kind: 'ports',
    label: 'open ports',
    async collect(ctx): Promise<PortsInfo> {
        const connections = await firstAvailable('connections', connectionStrategies, ctx);
        const listening = new Set<number>();
        for (const connection of connections ?? []) {
            if (connection.status === 'LISTEN') listening.add(connection.localPort);
        }

        if (listening.size === 0 && ctx.host.platform === 'linux') {
            const fallback = await attempt('listening ports', 'netstat -tuln', (host) =>
                parseNetstatListening(host.run('netstat', ['-tuln'])), ctx);
            for (const port of fallback ?? []) listening.add(port);
        }

        if (!connections && listening.size === 0) return {};

        return {
            listeningPorts: [...listening].sort((a, b) => a - b),
            totalConnections: connections?.length ?? 0,
            established: connections?.filter(c => c.status === 'ESTABLISHED').length ?? 0,
            topProcesses: connections ? rankProcesses(connections) : []
        };
    }
};
