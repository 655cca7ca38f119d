import { type Probe, type Strategy, firstAvailable, attempt, percentOf, round2, nonEmptyLines, BYTES_PER_MB } from './Probe';
import type { PerformanceInfo } from '../types';
import { netCounterStrategies } from '../sources/netCounters';
import { formatDateTime } from '../sources/clock';

const processCountStrategies: Strategy<number>[] = [
    {
        source: '/proc',
        read: (host) => host.readDir('/proc').filter(entry => /^\d+$/.test(entry)).length || undefined
    },
    {
        source: 'ps',
        read: (host) => host.platform === 'win32' ? undefined : nonEmptyLines(host.run('ps', ['-A', '-o', 'pid='])).length
    },
    {
        source: 'tasklist',
        read: (host) => host.platform === 'win32' ? nonEmptyLines(host.run('tasklist', ['/fo', 'csv', '/nh'])).length : undefined
    }
];

/** `vm.swapusage: total = 2048.00M  used = 1024.00M  free = 1024.00M  (encrypted)` */
export function parseSwapUsage(output: string): number | undefined {
    const total = output.match(/total = ([\d.]+)M/);
    const used = output.match(/used = ([\d.]+)M/);
    if (!total || !used) return undefined;
    return percentOf(Number(used[1]), Number(total[1]));
}

const swapStrategies: Strategy<number>[] = [
    {
        source: '/proc/meminfo',
        read: (host) => {
            const meminfo = host.readFile('/proc/meminfo');
            const total = meminfo.match(/^SwapTotal:\s+(\d+)/m);
            const free = meminfo.match(/^SwapFree:\s+(\d+)/m);
            if (!total || !free) return undefined;
            return percentOf(Number(total[1]) - Number(free[1]), Number(total[1]));
        }
    },
    {
        source: 'sysctl vm.swapusage',
        read: (host) => host.platform === 'darwin' ? parseSwapUsage(host.run('sysctl', ['vm.swapusage'])) : undefined
    }
];

export const performanceProbe: Probe<'performance'> = {
    kind: 'performance',
    label: 'performance metrics',
    async collect(ctx): Promise<PerformanceInfo> {
        // Windows reports zeros for load averages; show that they are unknown.
        const load = await attempt('load average', 'os.loadavg', (host) =>
            host.platform === 'win32' ? [-1, -1, -1] : host.system.loadavg().map(round2), ctx);
        const processCount = await firstAvailable('process count', processCountStrategies, ctx);
        const counters = await firstAvailable('network counters', netCounterStrategies, ctx);
        const swapPercent = await firstAvailable('swap', swapStrategies, ctx);
        const bootTime = await attempt('boot time', 'os.uptime', (host) => {
            const booted = new Date(host.now().getTime() - host.system.uptime() * 1000);
            return formatDateTime(booted, host.timeZone());
        }, ctx);

        return {
            load1: load?.[0],
            load5: load?.[1],
            load15: load?.[2],
            processCount,
            networkSentMb: counters && round2(counters.bytesSent / BYTES_PER_MB),
            networkRecvMb: counters && round2(counters.bytesRecv / BYTES_PER_MB),
            swapPercent,
            bootTime
        };
    }
};
