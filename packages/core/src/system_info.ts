// ============================================================================
// @textprobe/core — System Information
// ============================================================================

import os from 'node:os';
import process from 'node:process';
import type { EngineInfo } from './inference.js';

export interface SystemInfo {
  platform: string;
  arch: string;
  cpuCores: number;
  totalMemoryGb: number;
  runtime: string;
  runtimeVersion: string;
  engine: EngineInfo;
}

export function collectSystemInfo(engine: EngineInfo): SystemInfo {
  return {
    platform: os.platform(),
    arch: os.arch(),
    cpuCores: os.cpus().length,
    totalMemoryGb: os.totalmem() / (1024 * 1024 * 1024),
    runtime: 'Node.js',
    runtimeVersion: process.version,
    engine,
  };
}
