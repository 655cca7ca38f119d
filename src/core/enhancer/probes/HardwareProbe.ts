import { type Probe, type Strategy, firstAvailable, attempt } from './Probe';
import type { HardwareInfo } from '../types';
import { cpuModelStrategies } from '../sources/cpu';

const biosStrategies: Strategy<string>[] = [
    {
        source: '/sys/class/dmi/id/bios_version',
        read: (host) => host.platform === 'linux' ? host.readFile('/sys/class/dmi/id/bios_version').trim() || undefined : undefined
    },
    {
        source: 'wmic bios',
        read: (host) => {
            if (host.platform !== 'win32') return undefined;
            const lines = host.run('wmic', ['bios', 'get', 'smbiosbiosversion']).split(/\r?\n/).map(l => l.trim()).filter(Boolean);
            return lines[1];
        }
    }
];

export const hardwareProbe: Probe<'hardware'> = {
    kind: 'hardware',
    label: 'hardware info',
    async collect(ctx): Promise<HardwareInfo> {
        const machineType = await firstAvailable('machine type', [
            { source: 'os.machine', read: (host) => host.system.machine() || undefined },
            { source: 'os.arch', read: (host) => host.system.arch() }
        ], ctx);
        const processor = await firstAvailable('processor', cpuModelStrategies, ctx);
        const biosVersion = await firstAvailable('bios version', biosStrategies, ctx);
        const bootMode = await attempt('boot mode', '/sys/firmware/efi', (host) => {
            if (host.platform !== 'linux') return 'Unknown';
            return host.exists('/sys/firmware/efi') ? 'UEFI' : 'Legacy BIOS';
        }, ctx);

        return {
            machineType,
            processor: processor ?? 'Unknown',
            biosVersion: biosVersion ?? 'Unknown',
            bootMode: bootMode ?? 'Unknown'
        };
    }
};
