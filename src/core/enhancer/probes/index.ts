import type { EnhancementKind } from '../EnhancementKind';
import type { ProbeResult } from '../types';
import { type Probe, type ProbeContext, hasData } from './Probe';
import { describeError } from '../../../utils/ErrorHandler';
import { timeProbe } from './TimeProbe';
import { systemProbe } from './SystemProbe';
import { networkProbe } from './NetworkProbe';
import { localeProbe } from './LocaleProbe';
import { timezoneProbe } from './TimezoneProbe';
import { performanceProbe } from './PerformanceProbe';
import { hardwareProbe } from './HardwareProbe';
import { usersProbe } from './UsersProbe';
import { networkTrafficProbe } from './NetworkTrafficProbe';
import { portsProbe } from './PortsProbe';
import { processesProbe } from './ProcessesProbe';
import { filesystemProbe } from './FilesystemProbe';
import { servicesProbe } from './ServicesProbe';

export type ProbeCatalog = { [K in EnhancementKind]: Probe<K> };

export const PROBES: ProbeCatalog = {
    time: timeProbe,
    system: systemProbe,
    network: networkProbe,
    locale: localeProbe,
    timezone: timezoneProbe,
    performance: performanceProbe,
    hardware: hardwareProbe,
    users: usersProbe,
    network_traffic: networkTrafficProbe,
    ports: portsProbe,
    processes: processesProbe,
    filesystem: filesystemProbe,
    services: servicesProbe
};

/**
 * Run one probe. Never rejects: a throwing probe, or one that found nothing
 * at all, yields `null` and a warning on the context logger.
 */
export async function collectEnhancement<K extends EnhancementKind>(
    kind: K,
    ctx: ProbeContext,
    catalog: ProbeCatalog = PROBES
): Promise<ProbeResult<K>> {
    const probe = catalog[kind];
    try {
        const result = await probe.collect(ctx);
        if (!hasData(result)) {
            ctx.logger.warn(`Error getting ${probe.label}: no data source available`);
            return null;
        }
        return result;
    } catch (error) {
        ctx.logger.warn(`Error getting ${probe.label}: ${describeError(error)}`);
        return null;
    }
}

export type { Probe, ProbeContext, Strategy } from './Probe';
export { firstAvailable } from './Probe';
