import os from 'node:os';
import type { HostProbe, HostUsage } from '../../domain/interfaces/host-probe.interface.js';

type CpuTimes = { idle: number; total: number };

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

/**
 * Host CPU and memory utilisation. CPU is measured over the interval since the
 * previous sample; the first sample covers the time since boot.
 */
export class HostResourceProbe implements HostProbe {
  private previous: CpuTimes = { idle: 0, total: 0 };

  sample(): HostUsage {
    const current = readCpuTimes();
    const idleDelta = current.idle - this.previous.idle;
    const totalDelta = current.total - this.previous.total;
    this.previous = current;

    const cpuPercent = totalDelta > 0 ? (1 - idleDelta / totalDelta) * 100 : 0;
    const memoryPercent = (1 - os.freemem() / os.totalmem()) * 100;

    return {
      cpuPercent: round1(cpuPercent),
      memoryPercent: round1(memoryPercent),
    };
  }
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
