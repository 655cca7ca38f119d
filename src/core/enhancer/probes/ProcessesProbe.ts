import { type Probe, firstAvailable } from './Probe';
import type { ProcessesInfo } from '../types';
import { type ProcessRow, processTableStrategies } from '../sources/processTable';

function rankBy(rows: ProcessRow[], field: 'cpuPercent' | 'memoryPercent'): string[] {
    return rows
        .filter(row => row[field] > 0)
        .sort((a, b) => b[field] - a[field])
        .map(row => `${row.name} (${row[field].toFixed(1)}%)`);
}

export function summarizeProcesses(rows: ProcessRow[]): ProcessesInfo {
    return {
        total: rows.length,
        running: rows.filter(row => row.state?.startsWith('R')).length,
        topCpu: rankBy(rows, 'cpuPercent'),
        topMemory: rankBy(rows, 'memoryPercent')
    };
}

export const processesProbe: Probe<'processes'> = {
    kind: 'processes',
    label: 'process info',
    async collect(ctx): Promise<ProcessesInfo> {
        const rows = await firstAvailable('process table', processTableStrategies, ctx);
        return rows ? summarizeProcesses(rows) : {};
    }
};
