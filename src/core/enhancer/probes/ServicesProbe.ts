import { type Probe, type Strategy, firstAvailable, nonEmptyLines } from './Probe';
import type { ServicesInfo } from '../types';
import { processTableStrategies } from '../sources/processTable';

export const CRITICAL_SERVICE_NAMES = [
    'sshd', 'httpd', 'apache2', 'nginx', 'mysql', 'mariadb',
    'postgresql', 'mongodb', 'redis', 'memcached', 'docker', 'containerd',
    'firewalld', 'ufw', 'ntpd', 'systemd', 'networkmanager', 'cron'
];

export const WINDOWS_CRITICAL_SERVICE_NAMES = [
    'Windows Firewall', 'Windows Defender', 'Windows Update',
    'SQL Server', 'IIS', 'DHCP', 'DNS', 'Print Spooler',
    'Remote Desktop', 'Windows Time'
];

interface ServiceListing {
    services: string[];
    /** Substrings that mark a service on this platform as critical */
    patterns: readonly string[];
}

/**
 * Names containing any pattern (case-insensitive), each exact name once, in
 * first-seen order. Near duplicates (`nginx`, `nginx.service`) stay distinct.
 */
export function classifyCritical(names: readonly string[], patterns: readonly string[]): string[] {
    const lowered = patterns.map(pattern => pattern.toLowerCase());
    const critical = names.filter(name => lowered.some(pattern => name.toLowerCase().includes(pattern)));
    return [...new Set(critical)];
}

/** `systemctl list-units --type=service --state=running --plain --no-legend` */
export function parseSystemctlUnits(output: string): string[] {
    return nonEmptyLines(output)
        .filter(line => line.includes('.service') && line.includes('running'))
        .map(line => line.split('.service')[0].trim());
}

/** `service --status-all`: ` [ + ]  cron` marks a running service. */
export function parseServiceStatusAll(output: string): string[] {
    return nonEmptyLines(output)
        .filter(line => line.includes('[ + ]'))
        .map(line => line.split('[ + ]')[1].trim());
}

/** `net start` lists one running service per line between two banner lines. */
export function parseNetStart(output: string): string[] {
    return nonEmptyLines(output)
        .filter(line => !line.endsWith(':') && !line.startsWith('The command'));
}

const serviceStrategies: Strategy<ServiceListing>[] = [
    {
        source: 'systemctl',
        read: (host) => host.platform !== 'linux' ? undefined : {
            services: parseSystemctlUnits(host.run('systemctl', [
                'list-units', '--type=service', '--state=running', '--plain', '--no-legend', '--no-pager'
            ])),
            patterns: CRITICAL_SERVICE_NAMES
        }
    },
    {
        source: 'service --status-all',
        read: (host) => host.platform !== 'linux' ? undefined : {
            services: parseServiceStatusAll(host.run('service', ['--status-all'])),
            patterns: CRITICAL_SERVICE_NAMES
        }
    },
    {
        source: 'net start',
        read: (host) => host.platform !== 'win32' ? undefined : {
            services: parseNetStart(host.run('net', ['start'])),
            patterns: WINDOWS_CRITICAL_SERVICE_NAMES
        }
    }
];

export const servicesProbe: Probe<'services'> = {
    kind: 'services',
    label: 'services info',
    async collect(ctx): Promise<ServicesInfo> {
        const listing = await firstAvailable('services', serviceStrategies, ctx);
        const services = listing?.services ?? [];
        let critical = classifyCritical(services, listing?.patterns ?? CRITICAL_SERVICE_NAMES);

        // No service manager answered: look for the same daemons among processes.
        if (services.length === 0) {
            const processes = await firstAvailable('process table', processTableStrategies, ctx);
            if (!listing && !processes) return {};
            critical = classifyCritical((processes ?? []).map(row => row.name), CRITICAL_SERVICE_NAMES);
        }

        return {
            runningCount: services.length,
            services,
            critical
        };
    }
};
