/**
 * 主机资源采集器
 *
 * CPU、内存、交换分区与磁盘读自运行巡检程序的主机，不经过数据库会话。
 *
 * @fileoverview 主机资源采集
 * @since 1.0.0
 */

import * as si from 'systeminformation';
import { Session } from '../connection.js';
import { ErrorHandler } from '../errorHandler.js';
import { ErrorCategory, ErrorSeverity, MetricSample, MonitorError } from '../types.js';
import { BaseCollector } from './baseCollector.js';

export class SystemResourcesCollector extends BaseCollector {
  public readonly name = 'system_resources' as const;

  public async collect(_session: Session): Promise<MetricSample[]> {
    let load: si.Systeminformation.CurrentLoadData;
    let memory: si.Systeminformation.MemData;
    let disks: si.Systeminformation.FsSizeData[];

    try {
      [load, memory, disks] = await Promise.all([si.currentLoad(), si.mem(), si.fsSize()]);
    } catch (error) {
      throw new MonitorError(
        `主机指标读取失败: ${ErrorHandler.messageOf(error)}`,
        ErrorCategory.HOST_METRICS_ERROR,
        ErrorSeverity.MEDIUM,
        error instanceof Error ? error : undefined
      );
    }

    const buffer = this.buffer()
      .number('system.cpu.usage_percent', load.currentLoad)
      .number('system.cpu.cores', load.cpus.length)
      .number('system.memory.total_bytes', memory.total)
      // available 包含可回收的缓存，used 字段在 Linux 上把缓存也算作已用
      .number('system.memory.used_bytes', memory.total - memory.available)
      .number('system.swap.total_bytes', memory.swaptotal)
      .number('system.swap.used_bytes', memory.swapused);

    const disk = disks.find(entry => entry.mount === this.options.diskPath) ?? disks[0];
    if (disk) {
      buffer
        .text('system.disk.mount', disk.mount)
        .number('system.disk.total_bytes', disk.size)
        .number('system.disk.used_bytes', disk.used);
    }

    return buffer.toArray();
  }
}
