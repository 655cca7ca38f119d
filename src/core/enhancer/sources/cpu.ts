import type { Strategy } from '../probes/Probe';

function cpuinfoField(cpuinfo: string, field: string): string | undefined {
    for (const line of cpuinfo.split('\n')) {
        const [key, ...rest] = line.split(':');
        if (key.trim() === field && rest.length > 0) {
            const value = rest.join(':').trim();
            if (value) return value;
        }
    }
    return undefined;
}

export const cpuModelStrategies: Strategy<string>[] = [
    {
        source: 'os.cpus',
        read: (host) => host.system.cpus()[0]?.model.trim() || undefined
    },
    {
        source: '/proc/cpuinfo',
        read: (host) => cpuinfoField(host.readFile('/proc/cpuinfo'), 'model name')
    },
    {
        source: 'wmic cpu',
        read: (host) => {
            if (host.platform !== 'win32') return undefined;
            const lines = host.run('wmic', ['cpu', 'get', 'name']).split(/\r?\n/).map(l => l.trim()).filter(Boolean);
            return lines[1];
        }
    }
];

/** Distinct (physical id, core id) pairs; undefined when the kernel does not report them. */
export function countPhysicalCores(cpuinfo: string): number | undefined {
    const cores = new Set<string>();
    let physicalId = '0';
    for (const line of cpuinfo.split('\n')) {
        const [rawKey, ...rest] = line.split(':');
        const key = rawKey.trim();
        const value = rest.join(':').trim();
        if (key === 'physical id') physicalId = value;
        if (key === 'core id') cores.add(`${physicalId}:${value}`);
    }
    return cores.size > 0 ? cores.size : undefined;
}

export interface CpuTimes {
    busy: number;
    total: number;
}

export const cpuTimesStrategies: Strategy<CpuTimes>[] = [
    {
        source: 'os.cpus',
        read: (host) => {
            const cpus = host.system.cpus();
            if (cpus.length === 0) return undefined;
            let idle = 0;
            let total = 0;
            for (const cpu of cpus) {
                const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
                idle += cpuIdle;
                total += user + nice + sys + cpuIdle + irq;
            }
            return total > 0 ? { busy: total - idle, total } : undefined;
        }
    },
    {
        source: '/proc/stat',
        read: (host) => {
            const line = host.readFile('/proc/stat').split('\n').find(l => l.startsWith('cpu '));
            if (!line) return undefined;
            const fields = line.trim().split(/\s+/).slice(1).map(Number);
            const total = fields.reduce((sum, n) => sum + n, 0);
            // idle + iowait
            const idle = (fields[3] ?? 0) + (fields[4] ?? 0);
            return total > 0 ? { busy: total - idle, total } : undefined;
        }
    }
];
