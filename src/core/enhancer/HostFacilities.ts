import fs from 'fs';
import os from 'os';
import dgram from 'dgram';
import { execFileSync } from 'child_process';
import { setTimeout as delay } from 'timers/promises';

export interface FsStats {
    /** Fundamental block size in bytes */
    bsize: number;
    blocks: number;
    bfree: number;
    /** Blocks available to unprivileged users */
    bavail: number;
}

/** The `os` readings the probes rely on. */
export interface SystemFacts {
    hostname(): string;
    /** `Linux`, `Darwin`, `Windows_NT`, ... */
    type(): string;
    release(): string;
    machine(): string;
    arch(): string;
    cpus(): os.CpuInfo[];
    totalmem(): number;
    freemem(): number;
    /** Seconds since boot */
    uptime(): number;
    loadavg(): number[];
    networkInterfaces(): NodeJS.Dict<os.NetworkInterfaceInfo[]>;
    username(): string;
}

/**
 * Everything a probe may read from the machine it runs on.
 *
 * Each method either returns data or throws; probes decide what a failure
 * means. Tests swap in a fake where any facility can be made to fail.
 */
export interface HostFacilities {
    readonly platform: NodeJS.Platform;
    readonly env: Readonly<Record<string, string | undefined>>;
    readonly system: SystemFacts;
    /** Runs a read-only command and returns its stdout. Throws when it is missing or exits non-zero. */
    run(command: string, args: readonly string[]): string;
    readFile(filePath: string): string;
    readDir(dirPath: string): string[];
    readLink(linkPath: string): string;
    exists(filePath: string): boolean;
    statfs(mountPoint: string): FsStats;
    now(): Date;
    /** IANA name of the runtime's local time zone */
    timeZone(): string;
    sleep(ms: number): Promise<void>;
    /** Local address the kernel would route outbound traffic from. */
    outboundAddress(): Promise<string>;
    /** Issues one request to `url` and resolves to the round-trip time in ms. */
    reach(url: string, timeoutMs: number): Promise<number>;
}

function outboundAddress(): Promise<string> {
    return new Promise((resolve, reject) => {
        const socket = dgram.createSocket('udp4');
        socket.once('error', (error) => {
            socket.close();
            reject(error);
        });
        // connect() on UDP only selects a route; nothing is sent.
        socket.connect(1, '10.255.255.255', () => {
            try {
                resolve(socket.address().address);
            } catch (error) {
                reject(error);
            } finally {
                socket.close();
            }
        });
    });
}

async function reach(url: string, timeoutMs: number): Promise<number> {
    const started = Date.now();
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    await response.body?.cancel();
    return Date.now() - started;
}

/** Facilities backed by the real machine. */
export function createNodeHost(): HostFacilities {
    return {
        platform: process.platform,
        env: process.env,
        system: {
            hostname: () => os.hostname(),
            type: () => os.type(),
            release: () => os.release(),
            machine: () => os.machine(),
            arch: () => os.arch(),
            cpus: () => os.cpus(),
            totalmem: () => os.totalmem(),
            freemem: () => os.freemem(),
            uptime: () => os.uptime(),
            loadavg: () => os.loadavg(),
            networkInterfaces: () => os.networkInterfaces(),
            username: () => os.userInfo().username
        },
        run: (command, args) => execFileSync(command, [...args], {
            encoding: 'utf8',
            stdio: ['ignore', 'pipe', 'ignore'],
            windowsHide: true
        }),
        readFile: (filePath) => fs.readFileSync(filePath, 'utf8'),
        readDir: (dirPath) => fs.readdirSync(dirPath),
        readLink: (linkPath) => fs.readlinkSync(linkPath),
        exists: (filePath) => fs.existsSync(filePath),
        statfs: (mountPoint) => fs.statfsSync(mountPoint),
        now: () => new Date(),
        timeZone: () => Intl.DateTimeFormat().resolvedOptions().timeZone,
        sleep: (ms) => delay(ms),
        outboundAddress,
        reach
    };
}
