import type { Strategy } from '../probes/Probe';

export interface ProcessRow {
    pid: number;
    name: string;
    /** `ps` state code (`R`, `S`, `Ss`, ...) where the source reports one */
    state?: string;
    cpuPercent: number;
    memoryPercent: number;
}

/**
 * Parse `ps -A -o pid=,stat=,pcpu=,pmem=,comm=`.
 * On macOS `comm` is the executable path, on Linux the short task name
 * (which may itself contain a slash, e.g. `kworker/0:1`).
 */
export function parsePsOutput(output: string): ProcessRow[] {
    const rows: ProcessRow[] = [];
    for (const line of output.split('\n')) {
        const match = line.match(/^\s*(\d+)\s+(\S+)\s+([\d.]+)\s+([\d.]+)\s+(.+?)\s*$/);
        if (!match) continue;
        const command = match[5];
        rows.push({
            pid: Number(match[1]),
            state: match[2],
            cpuPercent: Number(match[3]),
            memoryPercent: Number(match[4]),
            name: command.startsWith('/') ? command.slice(command.lastIndexOf('/') + 1) : command
        });
    }
    return rows;
}

/** Parse `tasklist /fo csv /nh`: `"name","pid","session","#","12,345 K"`. */
export function parseTasklistCsv(output: string, totalMemoryBytes: number): ProcessRow[] {
    const rows: ProcessRow[] = [];
    for (const line of output.split(/\r?\n/)) {
        const cells = [...line.matchAll(/"([^"]*)"/g)].map(m => m[1]);
        if (cells.length < 5) continue;
        const pid = Number(cells[1]);
        if (!Number.isInteger(pid)) continue;
        const memoryKb = Number(cells[4].replace(/[^\d]/g, ''));
        rows.push({
            pid,
            name: cells[0],
            cpuPercent: 0,
            memoryPercent: totalMemoryBytes > 0 ? Math.round((memoryKb * 1024 / totalMemoryBytes) * 1000) / 10 : 0
        });
    }
    return rows;
}

export const processTableStrategies: Strategy<ProcessRow[]>[] = [
    {
        source: 'ps',
        read: (host) => {
            if (host.platform === 'win32') return undefined;
            const rows = parsePsOutput(host.run('ps', ['-A', '-o', 'pid=,stat=,pcpu=,pmem=,comm=']));
            return rows.length > 0 ? rows : undefined;
        }
    },
    {
        source: 'tasklist',
        read: (host) => {
            if (host.platform !== 'win32') return undefined;
            const rows = parseTasklistCsv(host.run('tasklist', ['/fo', 'csv', '/nh']), host.system.totalmem());
            return rows.length > 0 ? rows : undefined;
        }
    }
];
