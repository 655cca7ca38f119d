import type { EnhancementKind } from './EnhancementKind';
import type { ProbeDataMap, ProbeResult } from './types';

/** How many entries of each list make it into the prompt. */
export const RENDER_LIMITS = {
    users: 5,
    listeningPorts: 10,
    networkProcesses: 5,
    processes: 5,
    filesystems: 3,
    criticalServices: 5
} as const;

type Renderers = { [K in EnhancementKind]: (data: ProbeDataMap[K]) => string[] };
type Line = string | undefined;

function present(...values: unknown[]): boolean {
    return values.some(value => value !== undefined);
}

function show(value: string | number | undefined): string {
    return value === undefined ? 'unknown' : String(value);
}

function list(items: readonly (string | number)[]): string {
    return items.length > 0 ? items.join(', ') : 'none';
}

function lines(...candidates: Line[]): string[] {
    return candidates.filter((line): line is string => line !== undefined);
}

/** Header plus indented details; nothing at all when no detail survived. */
function section(header: string, ...details: Line[]): string[] {
    const body = lines(...details);
    return body.length > 0 ? [header, ...body] : [];
}

const renderers: Renderers = {
    time: (t) => lines(
        t.full !== undefined ? `Current time: ${t.full}` : undefined,
        t.utc !== undefined ? `UTC time: ${t.utc}` : undefined
    ),

    system: (s) => lines(
        present(s.os, s.version) ? `System: ${show(s.os)} ${show(s.version)}` : undefined,
        present(s.cpuModel, s.cpuCores, s.cpuUsage)
            ? `CPU: ${show(s.cpuModel)} (${show(s.cpuCores)} cores, ${show(s.cpuUsage)}% usage)`
            : undefined,
        present(s.memoryTotalGb, s.memoryPercent)
            ? `RAM: ${show(s.memoryTotalGb)}GB total, ${show(s.memoryPercent)}% used`
            : undefined,
        present(s.diskTotalGb, s.diskPercent)
            ? `Disk: ${show(s.diskTotalGb)}GB total, ${show(s.diskPercent)}% used`
            : undefined,
        s.uptime !== undefined ? `System uptime: ${s.uptime}` : undefined
    ),

    network: (n) => lines(
        present(n.localIp, n.hostname) ? `Network: IP ${show(n.localIp)}, hostname ${show(n.hostname)}` : undefined,
        n.interfaces ? `Network interfaces: ${list(n.interfaces)}` : undefined,
        n.internetAvailable === undefined
            ? undefined
            : n.internetAvailable
                ? `Internet connection: Available (latency: ${show(n.latencyMs)}ms)`
                : 'Internet connection: Unavailable'
    ),

    locale: (l) => lines(
        present(l.language, l.encoding) ? `System locale: ${show(l.language)}, ${show(l.encoding)}` : undefined,
        l.currency !== undefined ? `Currency: ${l.currency}` : undefined,
        l.timeFormat !== undefined ? `Time format: ${l.timeFormat}` : undefined,
        l.dateFormat !== undefined ? `Date format: ${l.dateFormat}` : undefined
    ),

    timezone: (z) => section('Timezone information:',
        z.current !== undefined ? `  Current timezone: ${z.current}` : undefined,
        z.utcOffset !== undefined ? `  UTC offset: ${z.utcOffset}` : undefined,
        z.dstActive !== undefined ? `  DST active: ${z.dstActive ? 'True' : 'False'}` : undefined
    ),

    performance: (p) => section('System performance:',
        present(p.load1, p.load5, p.load15)
            ? `  CPU load: 1min: ${show(p.load1)}, 5min: ${show(p.load5)}, 15min: ${show(p.load15)}`
            : undefined,
        p.processCount !== undefined ? `  Process count: ${p.processCount}` : undefined,
        present(p.networkSentMb, p.networkRecvMb)
            ? `  Network usage: ${show(p.networkSentMb)}MB sent, ${show(p.networkRecvMb)}MB received`
            : undefined,
        p.swapPercent !== undefined ? `  Swap usage: ${p.swapPercent}%` : undefined
    ),

    hardware: (h) => section('Hardware information:',
        h.machineType !== undefined ? `  Machine type: ${h.machineType}` : undefined,
        h.processor !== undefined ? `  Processor: ${h.processor}` : undefined,
        h.biosVersion !== undefined ? `  BIOS version: ${h.biosVersion}` : undefined,
        h.bootMode !== undefined ? `  Boot mode: ${h.bootMode}` : undefined
    ),

    users: (u) => {
        let current: Line;
        if (u.loggedUsers) {
            const shown = u.loggedUsers.slice(0, RENDER_LIMITS.users);
            const hidden = u.loggedUsers.length - shown.length;
            current = `  Current users: ${list(shown)}${hidden > 0 ? ` and ${hidden} more` : ''}`;
        }
        return section('Users information:',
            u.loggedUsersCount !== undefined ? `  Logged in users: ${u.loggedUsersCount}` : undefined,
            current,
            u.systemUsersCount !== undefined ? `  System users: ${u.systemUsersCount}` : undefined,
            u.sessionsCount !== undefined ? `  User sessions: ${u.sessionsCount}` : undefined
        );
    },

    network_traffic: (t) => section('Network traffic:',
        t.downloadSpeed !== undefined ? `  Current download speed: ${t.downloadSpeed} KB/s` : undefined,
        t.uploadSpeed !== undefined ? `  Current upload speed: ${t.uploadSpeed} KB/s` : undefined,
        t.totalReceivedMb !== undefined ? `  Total downloaded: ${t.totalReceivedMb} MB` : undefined,
        t.totalSentMb !== undefined ? `  Total uploaded: ${t.totalSentMb} MB` : undefined,
        t.packetsRecv !== undefined ? `  Packets received: ${t.packetsRecv}` : undefined,
        t.packetsSent !== undefined ? `  Packets sent: ${t.packetsSent}` : undefined
    ),

    ports: (p) => {
        const ports = p.listeningPorts;
        const hiddenPorts = ports ? ports.length - RENDER_LIMITS.listeningPorts : 0;
        return section('Open ports and connections:',
            p.totalConnections !== undefined ? `  Total connections: ${p.totalConnections}` : undefined,
            ports ? `  Listening ports: ${list(ports.slice(0, RENDER_LIMITS.listeningPorts))}` : undefined,
            hiddenPorts > 0 ? `    and ${hiddenPorts} more...` : undefined,
            p.established !== undefined ? `  Established connections: ${p.established}` : undefined,
            p.topProcesses
                ? `  Top processes using network: ${list(p.topProcesses.slice(0, RENDER_LIMITS.networkProcesses))}`
                : undefined
        );
    },

    processes: (p) => section('Process information:',
        p.total !== undefined ? `  Total processes: ${p.total}` : undefined,
        p.running !== undefined ? `  Running processes: ${p.running}` : undefined,
        p.topCpu ? `  Top CPU processes: ${list(p.topCpu.slice(0, RENDER_LIMITS.processes))}` : undefined,
        p.topMemory ? `  Top memory processes: ${list(p.topMemory.slice(0, RENDER_LIMITS.processes))}` : undefined
    ),

    filesystem: (f) => {
        const disks = f.disks ?? [];
        const hidden = disks.length - RENDER_LIMITS.filesystems;
        return section('Filesystem information:',
            ...disks.slice(0, RENDER_LIMITS.filesystems).map(d =>
                `  ${d.device}: ${d.mountpoint}, ${d.fstype}, ${d.totalGb}GB total, ${d.percent}% used`),
            hidden > 0 ? `  ... and ${hidden} more filesystems` : undefined,
            present(f.ioRead, f.ioWrite)
                ? `  Total file operations: ${show(f.ioRead)} reads, ${show(f.ioWrite)} writes`
                : undefined
        );
    },

    services: (s) => {
        const hidden = s.critical ? s.critical.length - RENDER_LIMITS.criticalServices : 0;
        return section('System services:',
            s.runningCount !== undefined ? `  Running services: ${s.runningCount}` : undefined,
            s.critical ? `  Critical services: ${list(s.critical.slice(0, RENDER_LIMITS.criticalServices))}` : undefined,
            hidden > 0 ? `    ... and ${hidden} more` : undefined
        );
    }
};

/**
 * Text lines for one probe result. Pure; an absent result renders nothing.
 */
export function renderEnhancement<K extends EnhancementKind>(kind: K, result: ProbeResult<K>): string[] {
    if (result === null) return [];
    const render: (data: ProbeDataMap[K]) => string[] = renderers[kind];
    return render(result);
}
