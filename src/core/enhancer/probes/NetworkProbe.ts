import os from 'os';
import { type Probe, type Strategy, firstAvailable, attempt, round2 } from './Probe';
import type { NetworkInfo } from '../types';
import type { HostFacilities } from '../HostFacilities';

const INTERNET_TIMEOUT_MS = 2000;

function externalAddresses(host: HostFacilities): os.NetworkInterfaceInfo[] {
    return Object.values(host.system.networkInterfaces())
        .flatMap(addresses => addresses ?? [])
        .filter(address => !address.internal);
}

const localIpStrategies: Strategy<string>[] = [
    {
        source: 'udp route',
        read: (host) => host.outboundAddress()
    },
    {
        source: 'interface scan',
        read: (host) => externalAddresses(host).find(address => address.family === 'IPv4')?.address
    }
];

export const networkProbe: Probe<'network'> = {
    kind: 'network',
    label: 'network info',
    async collect(ctx): Promise<NetworkInfo> {
        const hostname = await attempt('hostname', 'os.hostname', (host) => host.system.hostname(), ctx);
        const localIp = await firstAvailable('local ip', localIpStrategies, ctx);
        const macAddress = await attempt('mac address', 'os.networkInterfaces', (host) =>
            externalAddresses(host).find(address => address.mac !== '00:00:00:00:00:00')?.mac, ctx);
        const interfaces = await attempt('interfaces', 'os.networkInterfaces', (host) =>
            Object.keys(host.system.networkInterfaces()), ctx);
        const latency = await attempt('internet', ctx.internetProbeUrl, (host) =>
            host.reach(ctx.internetProbeUrl, INTERNET_TIMEOUT_MS), ctx);

        return {
            hostname,
            localIp: localIp ?? '127.0.0.1',
            macAddress,
            interfaces,
            internetAvailable: latency !== undefined,
            latencyMs: latency === undefined ? -1 : round2(latency)
        };
    }
};
