export interface HostUsage {
  cpuPercent: number;
  memoryPercent: number;
}

export interface HostProbe {
  sample(): HostUsage;
}
