import { type Probe, type Strategy, firstAvailable, attempt, percentOf, round2, nonEmptyLines, BYTES_PER_GB } from './Probe';
import type { DiskInfo, FilesystemInfo } from '../types';
import type { HostFacilities } from '../HostFacilities';

interface IoTotals {
    reads: number;
    writes: number;
}

/** `/proc/mounts` escapes whitespace in paths as octal (`\040`). */
function unescapeMountPath(value: string): string {
    return value.replace(/\\([0-7]{3})/g, (_m, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

function statDisk(host: HostFacilities, device: string, mountpoint: string, fstype: string): DiskInfo {
    const stats = host.statfs(mountpoint);
    const total = stats.blocks * stats.bsize;
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    const available = stats.bavail * stats.bsize;
    return {
        device,
        mountpoint,
        fstype,
        totalGb: round2(total / BYTES_PER_GB),
        usedGb: round2(used / BYTES_PER_GB),
        percent: percentOf(used, used + available)
    };
}

/** Mounts backed by a device node (`/dev/...`), skipping pseudo filesystems. */
export function readMountedDisks(host: HostFacilities, mounts: string): DiskInfo[] {
    const disks: DiskInfo[] = [];
    for (const line of nonEmptyLines(mounts)) {
        const [device, rawMount, fstype] = line.split(/\s+/);
        if (!device?.startsWith('/') || !rawMount || !fstype) continue;
        try {
            disks.push(statDisk(host, device, unescapeMountPath(rawMount), fstype));
        } catch {
            // Unreadable mount (stale network share, permissions): leave it out.
            continue;
        }
    }
    return disks;
}

/** POSIX `df -kP`: `Filesystem 1024-blocks Used Available Capacity Mounted on`. */
export function parseDfOutput(output: string): DiskInfo[] {
    const disks: DiskInfo[] = [];
    for (const line of nonEmptyLines(output).slice(1)) {
        const cols = line.split(/\s+/);
        if (cols.length < 6 || !cols[0].startsWith('/')) continue;
        const totalKb = Number(cols[1]);
        const usedKb = Number(cols[2]);
        const percent = Number(cols[4].replace('%', ''));
        if ([totalKb, usedKb, percent].some(Number.isNaN)) continue;
        disks.push({
            device: cols[0],
            mountpoint: cols.slice(5).join(' '),
            fstype: 'unknown',
            totalGb: round2(totalKb * 1024 / BYTES_PER_GB),
            usedGb: round2(usedKb * 1024 / BYTES_PER_GB),
            percent
        });
    }
    return disks;
}

/**
 * Completed reads/writes summed over whole disks in `/proc/diskstats`
 * (partitions are skipped so that they are not counted twice).
 */
export function sumDiskstats(content: string, isWholeDisk: (name: string) => boolean): IoTotals {
    const totals: IoTotals = { reads: 0, writes: 0 };
    for (const line of nonEmptyLines(content)) {
        const cols = line.split(/\s+/);
        if (cols.length < 8 || !isWholeDisk(cols[2])) continue;
        totals.reads += Number(cols[3]) || 0;
        totals.writes += Number(cols[7]) || 0;
    }
    return totals;
}

const diskStrategies: Strategy<DiskInfo[]>[] = [
    {
        source: '/proc/mounts',
        read: (host) => {
            if (host.platform !== 'linux') return undefined;
            const disks = readMountedDisks(host, host.readFile('/proc/mounts'));
            return disks.length > 0 ? disks : undefined;
        }
    },
    {
        source: 'df -kP',
        read: (host) => host.platform === 'win32' ? undefined : parseDfOutput(host.run('df', ['-kP']))
    }
];

export const filesystemProbe: Probe<'filesystem'> = {
    kind: 'filesystem',
    label: 'filesystem info',
    async collect(ctx): Promise<FilesystemInfo> {
        const disks = await firstAvailable('disks', diskStrategies, ctx);
        const io = await attempt('disk io', '/proc/diskstats', (host) =>
            sumDiskstats(host.readFile('/proc/diskstats'), (name) =>
                !/^(loop|ram)/.test(name) && host.exists(`/sys/block/${name}`)), ctx);

        if (!disks && !io) return {};

        return {
            disks: disks ?? [],
            ioRead: io?.reads ?? 0,
            ioWrite: io?.writes ?? 0
        };
    }
};
