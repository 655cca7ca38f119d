import { describe, it, expect } from 'vitest';
import { parsePsOutput, parseTasklistCsv } from '../src/core/enhancer/sources/processTable';
import { countPhysicalCores } from '../src/core/enhancer/sources/cpu';
import { parseWho, parseQueryUser, parsePasswd, parseNetUser } from '../src/core/enhancer/probes/UsersProbe';
import { parsePosixLocale } from '../src/core/enhancer/probes/LocaleProbe';
import { parseSwapUsage } from '../src/core/enhancer/probes/PerformanceProbe';
import { parseDfOutput } from '../src/core/enhancer/probes/FilesystemProbe';
import { parseSsOutput, parseNetstatAno, parseLsofOutput, parseNetstatListening, rankProcesses } from '../src/core/enhancer/probes/PortsProbe';

describe('process table parsers', () => {
    it('reads ps rows and shortens executable paths', () => {
        const output = [
            '    1 Ss    0.0  0.1 /sbin/launchd',
            '  812 S     1.5  2.0 /Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
            '  900 I     0.0  0.0 kworker/0:1',
            'not a process row'
        ].join('\n');
        expect(parsePsOutput(output)).toEqual([
            { pid: 1, state: 'Ss', cpuPercent: 0, memoryPercent: 0.1, name: 'launchd' },
            { pid: 812, state: 'S', cpuPercent: 1.5, memoryPercent: 2, name: 'Google Chrome' },
            { pid: 900, state: 'I', cpuPercent: 0, memoryPercent: 0, name: 'kworker/0:1' }
        ]);
    });

    it('reads tasklist csv and derives memory share', () => {
        const output = '"System Idle Process","0","Services","0","8 K"\r\n"chrome.exe","4242","Console","1","102,400 K"\r\n';
        const rows = parseTasklistCsv(output, 1024 ** 3);
        expect(rows).toEqual([
            { pid: 0, name: 'System Idle Process', cpuPercent: 0, memoryPercent: 0 },
            { pid: 4242, name: 'chrome.exe', cpuPercent: 0, memoryPercent: 9.8 }
        ]);
    });
});

describe('countPhysicalCores', () => {
    it('counts distinct package and core pairs', () => {
        const cpuinfo = [
            'processor\t: 0', 'physical id\t: 0', 'core id\t\t: 0', '',
            'processor\t: 1', 'physical id\t: 0', 'core id\t\t: 1', '',
            'processor\t: 2', 'physical id\t: 0', 'core id\t\t: 0', ''
        ].join('\n');
        expect(countPhysicalCores(cpuinfo)).toBe(2);
    });

    it('is undefined when cores are not reported', () => {
        expect(countPhysicalCores('processor\t: 0\nmodel name\t: Test CPU\n')).toBeUndefined();
    });
});

describe('user parsers', () => {
    it('reads who output', () => {
        expect(parseWho('alice tty1 2024-03-05 09:00\n')).toEqual({ users: ['alice'], sessions: 1 });
    });

    it('reads query user output and drops the current-session marker', () => {
        const output = [
            ' USERNAME              SESSIONNAME        ID  STATE   IDLE TIME  LOGON TIME',
            '>alice                 console             1  Active      none   3/5/2024 9:00 AM',
            ' bob                   rdp-tcp#0           2  Active         5   3/5/2024 10:00 AM'
        ].join('\r\n');
        expect(parseQueryUser(output)).toEqual({ users: ['alice', 'bob'], sessions: 2 });
    });

    it('reads account names from passwd', () => {
        expect(parsePasswd('# header\nroot:x:0:0::/root:/bin/sh\ndaemon:x:1:1::/:/usr/sbin/nologin\n')).toEqual(['root', 'daemon']);
    });

    it('reads account names from net user', () => {
        const output = [
            '',
            'User accounts for \\\\DESKTOP',
            '',
            '-------------------------------------------------------------------------------',
            'Administrator            DefaultAccount           Guest',
            'alice',
            'The command completed successfully.',
            ''
        ].join('\r\n');
        expect(parseNetUser(output)).toEqual(['Administrator', 'DefaultAccount', 'Guest', 'alice']);
    });
});

describe('parsePosixLocale', () => {
    it('splits language and encoding', () => {
        expect(parsePosixLocale('en_US.UTF-8@euro')).toEqual({ language: 'en_US', encoding: 'UTF-8' });
        expect(parsePosixLocale('fr_FR')).toEqual({ language: 'fr_FR', encoding: undefined });
    });

    it('drops a modifier without an encoding', () => {
        expect(parsePosixLocale('de_DE@euro')).toEqual({ language: 'de_DE', encoding: undefined });
    });

    it('ignores the portable locales', () => {
        expect(parsePosixLocale('C')).toBeUndefined();
        expect(parsePosixLocale('POSIX')).toBeUndefined();
    });

    it('keeps the encoding of a portable locale', () => {
        expect(parsePosixLocale('C.UTF-8')).toEqual({ language: undefined, encoding: 'UTF-8' });
    });
});

describe('parseSwapUsage', () => {
    it('reads sysctl vm.swapusage', () => {
        expect(parseSwapUsage('vm.swapusage: total = 2048.00M  used = 512.00M  free = 1536.00M  (encrypted)')).toBe(25);
    });

    it('is undefined for unexpected output', () => {
        expect(parseSwapUsage('vm.swapusage: unknown')).toBeUndefined();
    });
});

describe('parseDfOutput', () => {
    it('keeps device-backed rows and mount points with spaces', () => {
        const output = [
            'Filesystem     1024-blocks      Used Available Capacity Mounted on',
            '/dev/disk1s1     104857600  52428800  52428800      50% /',
            'map auto_home            0         0         0     100% /System/Volumes/Data/home',
            '/dev/disk2s1       1048576    524288    524288      50% /Volumes/My Disk'
        ].join('\n');
        expect(parseDfOutput(output)).toEqual([
            { device: '/dev/disk1s1', mountpoint: '/', fstype: 'unknown', totalGb: 100, usedGb: 50, percent: 50 },
            { device: '/dev/disk2s1', mountpoint: '/Volumes/My Disk', fstype: 'unknown', totalGb: 1, usedGb: 0.5, percent: 50 }
        ]);
    });
});

describe('connection parsers', () => {
    it('reads ss rows', () => {
        expect(parseSsOutput('udp UNCONN 0 0 127.0.0.53%lo:53 0.0.0.0:* users:(("systemd-resolve",pid=500,fd=12))')).toEqual([
            { localPort: 53, status: 'NONE', process: 'systemd-resolve' }
        ]);
    });

    it('reads netstat -ano rows and resolves owners by pid', () => {
        const output = [
            'Active Connections',
            '',
            '  Proto  Local Address          Foreign Address        State           PID',
            '  TCP    0.0.0.0:135            0.0.0.0:0              LISTENING       1004',
            '  TCP    192.168.1.5:49702      52.1.1.1:443           ESTABLISHED     4242',
            '  UDP    0.0.0.0:5353           *:*                                    2020',
            '  TCP    [::]:445               [::]:0                 LISTENING       4'
        ].join('\r\n');
        const names = new Map([[1004, 'svchost.exe'], [4242, 'chrome.exe']]);
        expect(parseNetstatAno(output, names)).toEqual([
            { localPort: 135, status: 'LISTEN', process: 'svchost.exe' },
            { localPort: 49702, status: 'ESTABLISHED', process: 'chrome.exe' },
            { localPort: 5353, status: 'NONE', process: undefined },
            { localPort: 445, status: 'LISTEN', process: undefined }
        ]);
    });

    it('reads lsof rows', () => {
        const output = [
            'COMMAND   PID  USER   FD   TYPE DEVICE SIZE/OFF NODE NAME',
            'rapportd  512  alice  4u  IPv4 0x1234      0t0  TCP *:49152 (LISTEN)',
            'Browser   900  alice  30u IPv4 0x5678      0t0  TCP 192.168.1.5:50000->142.250.1.1:443 (ESTABLISHED)',
            'mDNSRespo 300  _mdns  8u  IPv4 0x9abc      0t0  UDP *:5353'
        ].join('\n');
        expect(parseLsofOutput(output)).toEqual([
            { localPort: 49152, status: 'LISTEN', process: 'rapportd' },
            { localPort: 50000, status: 'ESTABLISHED', process: 'Browser' },
            { localPort: 5353, status: 'NONE', process: 'mDNSRespo' }
        ]);
    });

    it('reads listening ports from netstat -tuln without duplicates', () => {
        const output = [
            'Active Internet connections (only servers)',
            'Proto Recv-Q Send-Q Local Address           Foreign Address         State',
            'tcp        0      0 0.0.0.0:22              0.0.0.0:*               LISTEN',
            'tcp6       0      0 :::22                   :::*                    LISTEN',
            'tcp        0      0 127.0.0.1:5432          0.0.0.0:*               LISTEN',
            'udp        0      0 0.0.0.0:68              0.0.0.0:*'
        ].join('\n');
        expect(parseNetstatListening(output)).toEqual([22, 5432]);
    });

    it('ranks owning processes by connection count', () => {
        expect(rankProcesses([
            { localPort: 80, status: 'LISTEN', process: 'nginx' },
            { localPort: 22, status: 'LISTEN', process: 'sshd' },
            { localPort: 22, status: 'ESTABLISHED', process: 'sshd' },
            { localPort: 68, status: 'NONE' }
        ])).toEqual(['sshd (2)', 'nginx (1)']);
    });
});
