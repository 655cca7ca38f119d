import type { Strategy } from '../probes/Probe';

export interface InterfaceCounters {
    bytesSent: number;
    bytesRecv: number;
    packetsSent: number;
    packetsRecv: number;
}

export interface NetCounters extends InterfaceCounters {
    perInterface: Record<string, InterfaceCounters>;
}

function totals(perInterface: Record<string, InterfaceCounters>): NetCounters {
    const sum: NetCounters = { bytesSent: 0, bytesRecv: 0, packetsSent: 0, packetsRecv: 0, perInterface };
    for (const counters of Object.values(perInterface)) {
        sum.bytesSent += counters.bytesSent;
        sum.bytesRecv += counters.bytesRecv;
        sum.packetsSent += counters.packetsSent;
        sum.packetsRecv += counters.packetsRecv;
    }
    return sum;
}

/** Parse Linux `/proc/net/dev`. */
export function parseProcNetDev(content: string): NetCounters | undefined {
    const perInterface: Record<string, InterfaceCounters> = {};
    for (const line of content.split('\n').slice(2)) {
        const colon = line.indexOf(':');
        if (colon < 0) continue;
        const name = line.slice(0, colon).trim();
        const fields = line.slice(colon + 1).trim().split(/\s+/).map(Number);
        if (fields.length < 10 || fields.some(Number.isNaN)) continue;
        perInterface[name] = {
            bytesRecv: fields[0],
            packetsRecv: fields[1],
            bytesSent: fields[8],
            packetsSent: fields[9]
        };
    }
    return Object.keys(perInterface).length > 0 ? totals(perInterface) : undefined;
}

/**
 * Parse BSD/macOS `netstat -ibn`. Only the `<Link#n>` row of each interface
 * carries its totals; columns are read from the right because the address
 * column is empty for some interfaces.
 */
export function parseNetstatIbn(output: string): NetCounters | undefined {
    const perInterface: Record<string, InterfaceCounters> = {};
    for (const line of output.split('\n').slice(1)) {
        const cols = line.trim().split(/\s+/);
        if (cols.length < 10 || !cols[2].startsWith('<Link#')) continue;
        const tail = cols.slice(-7).map(Number);
        if (tail.some(Number.isNaN)) continue;
        const [ipkts, , ibytes, opkts, , obytes] = tail;
        perInterface[cols[0]] = {
            packetsRecv: ipkts,
            bytesRecv: ibytes,
            packetsSent: opkts,
            bytesSent: obytes
        };
    }
    return Object.keys(perInterface).length > 0 ? totals(perInterface) : undefined;
}

export const netCounterStrategies: Strategy<NetCounters>[] = [
    {
        source: '/proc/net/dev',
        read: (host) => parseProcNetDev(host.readFile('/proc/net/dev'))
    },
    {
        source: 'netstat -ibn',
        read: (host) => host.platform === 'win32' ? undefined : parseNetstatIbn(host.run('netstat', ['-ibn']))
    }
];
