import { type Probe, firstAvailable, round2, BYTES_PER_KB, BYTES_PER_MB } from './Probe';
import type { NetworkTrafficInfo, InterfaceTraffic } from '../types';
import { type NetCounters, netCounterStrategies } from '../sources/netCounters';

/** Delay between the two counter snapshots. */
export const SAMPLE_INTERVAL_MS = 1000;

/**
 * Throughput between two snapshots taken `intervalMs` apart, in KB/s, plus the
 * totals of the later snapshot.
 */
export function computeTraffic(first: NetCounters, second: NetCounters, intervalMs = SAMPLE_INTERVAL_MS): NetworkTrafficInfo {
    const seconds = intervalMs / 1000;
    const interfaces: Record<string, InterfaceTraffic> = {};
    for (const [name, counters] of Object.entries(second.perInterface)) {
        interfaces[name] = {
            sentMb: round2(counters.bytesSent / BYTES_PER_MB),
            receivedMb: round2(counters.bytesRecv / BYTES_PER_MB),
            packetsSent: counters.packetsSent,
            packetsRecv: counters.packetsRecv
        };
    }

    return {
        downloadSpeed: round2((second.bytesRecv - first.bytesRecv) / BYTES_PER_KB / seconds),
        uploadSpeed: round2((second.bytesSent - first.bytesSent) / BYTES_PER_KB / seconds),
        totalSentMb: round2(second.bytesSent / BYTES_PER_MB),
        totalReceivedMb: round2(second.bytesRecv / BYTES_PER_MB),
        packetsSent: second.packetsSent,
        packetsRecv: second.packetsRecv,
        interfaces
    };
}

export const networkTrafficProbe: Probe<'network_traffic'> = {
    kind: 'network_traffic',
    label: 'network traffic',
    async collect(ctx): Promise<NetworkTrafficInfo> {
        const first = await firstAvailable('network counters', netCounterStrategies, ctx);
        if (!first) return {};

        await ctx.host.sleep(SAMPLE_INTERVAL_MS);

        const second = await firstAvailable('network counters', netCounterStrategies, ctx);
        if (!second) return {};

        return computeTraffic(first, second);
    }
};
