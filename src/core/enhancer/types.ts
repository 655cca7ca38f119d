/**
 * Structured results, one shape per enhancement kind.
 *
 * Every field is optional: a probe fills in what it could read and leaves the
 * rest undefined. A probe that could read nothing reports `null` instead.
 */

export interface TimeInfo {
    weekday?: string;
    /** e.g. `19 October 2026` */
    date?: string;
    /** 24h `HH:MM:SS` */
    time?: string;
    timeZone?: string;
    /** `<weekday>, <date> <time> (<zone>)` */
    full?: string;
    /** `YYYY-MM-DD HH:MM:SS UTC` */
    utc?: string;
    /** Seconds since the epoch */
    timestamp?: number;
}

export interface SystemInfo {
    os?: string;
    version?: string;
    cpuUsage?: number;
    cpuCores?: number;
    physicalCores?: number;
    cpuModel?: string;
    memoryPercent?: number;
    memoryTotalGb?: number;
    diskTotalGb?: number;
    diskPercent?: number;
    /** `D days, H hours, M minutes` */
    uptime?: string;
}

export interface NetworkInfo {
    hostname?: string;
    localIp?: string;
    macAddress?: string;
    interfaces?: string[];
    internetAvailable?: boolean;
    /** -1 when the probe URL could not be reached */
    latencyMs?: number;
}

export interface LocaleInfo {
    language?: string;
    encoding?: string;
    currency?: string;
    timeFormat?: string;
    dateFormat?: string;
}

export interface TimezoneInfo {
    current?: string;
    /** e.g. `+1 hours`, `-5.5 hours` */
    utcOffset?: string;
    dstActive?: boolean;
    examples?: string[];
}

export interface PerformanceInfo {
    load1?: number;
    load5?: number;
    load15?: number;
    processCount?: number;
    networkSentMb?: number;
    networkRecvMb?: number;
    swapPercent?: number;
    bootTime?: string;
}

export interface HardwareInfo {
    machineType?: string;
    processor?: string;
    biosVersion?: string;
    bootMode?: string;
}

export interface UsersInfo {
    loggedUsers?: string[];
    loggedUsersCount?: number;
    systemUsers?: string[];
    systemUsersCount?: number;
    sessionsCount?: number;
}

export interface InterfaceTraffic {
    sentMb: number;
    receivedMb: number;
    packetsSent: number;
    packetsRecv: number;
}

export interface NetworkTrafficInfo {
    /** KB/s */
    downloadSpeed?: number;
    /** KB/s */
    uploadSpeed?: number;
    totalSentMb?: number;
    totalReceivedMb?: number;
    packetsSent?: number;
    packetsRecv?: number;
    interfaces?: Record<string, InterfaceTraffic>;
}

export interface PortsInfo {
    /** Unique, ascending */
    listeningPorts?: number[];
    totalConnections?: number;
    established?: number;
    /** `name (count)`, most connections first */
    topProcesses?: string[];
}

export interface ProcessesInfo {
    total?: number;
    running?: number;
    /** `name (x.x%)`, busiest first */
    topCpu?: string[];
    topMemory?: string[];
}

export interface DiskInfo {
    device: string;
    mountpoint: string;
    fstype: string;
    totalGb: number;
    usedGb: number;
    percent: number;
}

export interface FilesystemInfo {
    disks?: DiskInfo[];
    ioRead?: number;
    ioWrite?: number;
}

export interface ServicesInfo {
    runningCount?: number;
    services?: string[];
    critical?: string[];
}

export interface ProbeDataMap {
    time: TimeInfo;
    system: SystemInfo;
    network: NetworkInfo;
    locale: LocaleInfo;
    timezone: TimezoneInfo;
    performance: PerformanceInfo;
    hardware: HardwareInfo;
    users: UsersInfo;
    network_traffic: NetworkTrafficInfo;
    ports: PortsInfo;
    processes: ProcessesInfo;
    filesystem: FilesystemInfo;
    services: ServicesInfo;
}

export type ProbeResult<K extends keyof ProbeDataMap> = ProbeDataMap[K] | null;
