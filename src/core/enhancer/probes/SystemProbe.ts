import { type Probe, type Strategy, firstAvailable, attempt, percentOf, round2, BYTES_PER_GB } from './Probe';
import type { SystemInfo } from '../types';
import { cpuModelStrategies, cpuTimesStrategies, countPhysicalCores } from '../sources/cpu';

interface MemoryReading {
    total: number;
    available: number;
}

interface DiskReading {
    total: number;
    percent: number;
}

const OS_NAMES: Record<string, string> = {
    Windows_NT: 'Windows'
};

const memoryStrategies: Strategy<MemoryReading>[] = [
    {
        source: 'os.totalmem',
        read: (host) => {
            const total = host.system.totalmem();
            return total > 0 ? { total, available: host.system.freemem() } : undefined;
        }
    },
    {
        source: '/proc/meminfo',
        read: (host) => {
            const meminfo = host.readFile('/proc/meminfo');
            const kb = (key: string) => {
                const match = meminfo.match(new RegExp(`^${key}:\\s+(\\d+)`, 'm'));
                return match ? Number(match[1]) * 1024 : undefined;
            };
            const total = kb('MemTotal');
            const available = kb('MemAvailable') ?? kb('MemFree');
            return total !== undefined && available !== undefined ? { total, available } : undefined;
        }
    }
];

const rootDiskStrategies: Strategy<DiskReading>[] = [
    {
        source: 'statfs',
        read: (host) => {
            const stats = host.statfs('/');
            const total = stats.blocks * stats.bsize;
            const used = (stats.blocks - stats.bfree) * stats.bsize;
            const available = stats.bavail * stats.bsize;
            return total > 0 ? { total, percent: percentOf(used, used + available) } : undefined;
        }
    },
    {
        source: 'df -kP /',
        read: (host) => {
            const line = host.run('df', ['-kP', '/']).trim().split('\n')[1];
            if (!line) return undefined;
            const cols = line.trim().split(/\s+/);
            const total = Number(cols[1]) * 1024;
            const percent = Number(cols[4]?.replace('%', ''));
            return Number.isFinite(total) && Number.isFinite(percent) ? { total, percent } : undefined;
        }
    }
];

export function formatUptime(seconds: number): string {
    const days = Math.floor(seconds / 86400);
    const hours = Math.floor((seconds % 86400) / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    return `${days} days, ${hours} hours, ${minutes} minutes`;
}

export const systemProbe: Probe<'system'> = {
    kind: 'system',
    label: 'system info',
    async collect(ctx): Promise<SystemInfo> {
        const osType = await attempt('os name', 'os.type', (host) => host.system.type(), ctx);
        const version = await attempt('os release', 'os.release', (host) => host.system.release(), ctx);
        const cpuModel = await firstAvailable('cpu model', cpuModelStrategies, ctx);
        const cpuCores = await attempt('cpu cores', 'os.cpus', (host) => host.system.cpus().length || undefined, ctx);
        const physicalCores = await attempt('physical cores', '/proc/cpuinfo', (host) => countPhysicalCores(host.readFile('/proc/cpuinfo')), ctx);
        const cpuTimes = await firstAvailable('cpu usage', cpuTimesStrategies, ctx);
        const memory = await firstAvailable('memory', memoryStrategies, ctx);
        const disk = await firstAvailable('root disk', rootDiskStrategies, ctx);
        const uptime = await attempt('uptime', 'os.uptime', (host) => host.system.uptime(), ctx);

        return {
            os: osType === undefined ? undefined : OS_NAMES[osType] ?? osType,
            version,
            cpuUsage: cpuTimes && percentOf(cpuTimes.busy, cpuTimes.total),
            cpuCores,
            physicalCores,
            cpuModel: cpuModel ?? 'Unknown CPU',
            memoryPercent: memory && percentOf(memory.total - memory.available, memory.total),
            memoryTotalGb: memory && round2(memory.total / BYTES_PER_GB),
            diskTotalGb: disk && round2(disk.total / BYTES_PER_GB),
            diskPercent: disk?.percent,
            uptime: uptime === undefined ? undefined : formatUptime(uptime)
        };
    }
};
