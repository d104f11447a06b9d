/**
 * 采集器注册表
 *
 * 按检查项名称登记采集器类型，等级策略只做名称集合运算，
 * 采集时再由注册表创建实例。
 *
 * @fileoverview 采集器注册表
 * @since 1.0.0
 */

import { CHECK_NAMES, CheckName, ErrorCategory, ErrorSeverity, MonitorError } from '../types.js';
import { BaseCollector, CollectorConstructor, CollectorOptions } from './baseCollector.js';
import { ConnectionStatsCollector } from './connectionStatsCollector.js';
import { InnoDBCollector } from './innodbCollector.js';
import { PerformanceSchemaCollector } from './performanceSchemaCollector.js';
import { QueryCacheCollector } from './queryCacheCollector.js';
import { SlowQueryCollector } from './slowQueryCollector.js';
import { SystemResourcesCollector } from './systemResourcesCollector.js';
import { TableStatisticsCollector } from './tableStatisticsCollector.js';

/**
 * 采集器注册表
 *
 * 主要功能：
 * - 1. 默认采集器登记
 * - 2. 按名称创建采集器实例
 * - 3. 替换或移除登记
 */
export class CollectorRegistry {
  /* 采集器类型注册表 */
  private readonly collectorRegistry = new Map<CheckName, CollectorConstructor>();

  constructor() {
    this.initializeDefaultCollectors();
  }

  private initializeDefaultCollectors(): void {
    this.collectorRegistry.set('system_resources', SystemResourcesCollector);
    this.collectorRegistry.set('connection_stats', ConnectionStatsCollector);
    this.collectorRegistry.set('innodb', InnoDBCollector);
    this.collectorRegistry.set('query_cache', QueryCacheCollector);
    this.collectorRegistry.set('slow_queries', SlowQueryCollector);
    this.collectorRegistry.set('performance_schema', PerformanceSchemaCollector);
    this.collectorRegistry.set('table_statistics', TableStatisticsCollector);
  }

  public register(name: CheckName, collector: CollectorConstructor): void {
    this.collectorRegistry.set(name, collector);
  }

  public unregister(name: CheckName): void {
    this.collectorRegistry.delete(name);
  }

  public has(name: CheckName): boolean {
    return this.collectorRegistry.has(name);
  }

  /**
   * 已登记的检查项，按采集顺序
   */
  public names(): CheckName[] {
    return CHECK_NAMES.filter(name => this.collectorRegistry.has(name));
  }

  /**
   * 创建采集器实例
   */
  public create(name: CheckName, options: CollectorOptions): BaseCollector {
    const CollectorClass = this.collectorRegistry.get(name);

    if (!CollectorClass) {
      throw new MonitorError(
        `未登记的采集器: ${name}。已登记: ${this.names().join(', ')}`,
        ErrorCategory.CONFIGURATION_ERROR,
        ErrorSeverity.MEDIUM
      );
    }

    return new CollectorClass(options);
  }
}
