/**
 * 默认阈值规则
 *
 * 百分比类指标取值 0-100，比率类指标取值 0-1，时长按毫秒比较。
 *
 * @fileoverview 默认阈值表
 * @since 1.0.0
 */

import { FindingSeverity, Threshold } from '../types.js';

const GIB = 1024 * 1024 * 1024;

export const DEFAULT_THRESHOLDS: readonly Threshold[] = [
  // 主机资源
  { name: 'cpu_usage', metric: 'system.cpu.usage_percent', comparator: '>', limit: 80, severity: FindingSeverity.WARNING, description: 'CPU 使用率过高' },
  { name: 'memory_usage', metric: 'system.memory.usage_percent', comparator: '>', limit: 85, severity: FindingSeverity.WARNING, description: '内存使用率过高' },
  { name: 'swap_usage', metric: 'system.swap.usage_percent', comparator: '>', limit: 50, severity: FindingSeverity.WARNING, description: '交换分区使用率过高' },
  { name: 'disk_usage', metric: 'system.disk.usage_percent', comparator: '>', limit: 90, severity: FindingSeverity.WARNING, description: '磁盘使用率过高' },
  { name: 'disk_usage_critical', metric: 'system.disk.usage_percent', comparator: '>', limit: 97, severity: FindingSeverity.CRITICAL, description: '磁盘即将写满' },

  // 连接
  { name: 'connection_usage', metric: 'connections.usage_percent', comparator: '>', limit: 80, severity: FindingSeverity.WARNING, description: '连接使用率过高' },
  { name: 'connection_usage_critical', metric: 'connections.usage_percent', comparator: '>', limit: 95, severity: FindingSeverity.CRITICAL, description: '连接数接近上限' },
  { name: 'max_used_connections', metric: 'connections.max_used_percent', comparator: '>=', limit: 90, severity: FindingSeverity.WARNING, description: '历史峰值连接数接近上限' },
  { name: 'aborted_connects', metric: 'connections.aborted_connect_percent', comparator: '>', limit: 10, severity: FindingSeverity.WARNING, description: '异常中断的连接比例过高' },
  { name: 'long_running_queries', metric: 'connections.long_running_queries', comparator: '>=', limit: 5, severity: FindingSeverity.WARNING, description: '长时间运行的语句过多' },

  // InnoDB
  { name: 'buffer_pool_hit_ratio', metric: 'innodb.buffer_pool.hit_ratio', comparator: '<', limit: 0.95, severity: FindingSeverity.WARNING, description: 'InnoDB 缓冲池命中率偏低' },
  { name: 'buffer_pool_hit_ratio_critical', metric: 'innodb.buffer_pool.hit_ratio', comparator: '<', limit: 0.8, severity: FindingSeverity.CRITICAL, description: 'InnoDB 缓冲池命中率严重偏低' },
  { name: 'buffer_pool_dirty_pages', metric: 'innodb.buffer_pool.dirty_percent', comparator: '>', limit: 75, severity: FindingSeverity.WARNING, description: '缓冲池脏页比例过高' },
  { name: 'row_lock_current_waits', metric: 'innodb.row_lock.current_waits', comparator: '>', limit: 0, severity: FindingSeverity.WARNING, description: '存在正在等待的行锁' },
  { name: 'row_lock_time_avg', metric: 'innodb.row_lock.time_avg', comparator: '>', limit: 500, severity: FindingSeverity.WARNING, description: '平均行锁等待时间过长' },

  // 查询缓存
  { name: 'query_cache_hit_ratio', metric: 'query_cache.hit_ratio', comparator: '<', limit: 0.3, severity: FindingSeverity.WARNING, description: '查询缓存命中率偏低' },
  { name: 'query_cache_memory_high', metric: 'query_cache.memory_usage_percent', comparator: '>', limit: 95, severity: FindingSeverity.WARNING, description: '查询缓存内存几乎用尽' },
  { name: 'query_cache_memory_low', metric: 'query_cache.memory_usage_percent', comparator: '<', limit: 20, severity: FindingSeverity.INFO, description: '查询缓存内存利用率偏低' },
  { name: 'query_cache_fragmentation', metric: 'query_cache.fragmentation_percent', comparator: '>', limit: 20, severity: FindingSeverity.WARNING, description: '查询缓存碎片率过高' },
  { name: 'query_cache_lowmem_prunes', metric: 'query_cache.lowmem_prune_ratio', comparator: '>', limit: 1 / 3, severity: FindingSeverity.WARNING, description: '查询缓存因内存不足频繁淘汰' },

  // 慢查询
  { name: 'slow_queries', metric: 'slow_queries.per_minute', comparator: '>', limit: 10, severity: FindingSeverity.WARNING, description: '每分钟慢查询数过多' },
  { name: 'recent_slow_queries', metric: 'slow_queries.recent_count', comparator: '>', limit: 5, severity: FindingSeverity.WARNING, description: '慢查询日志中近期慢查询过多' },

  // performance_schema
  { name: 'high_latency_statements', metric: 'performance_schema.statements.high_latency_count', comparator: '>', limit: 0, severity: FindingSeverity.WARNING, description: '存在平均延迟过高的语句' },
  { name: 'metadata_lock_waits', metric: 'performance_schema.metadata_locks.pending', comparator: '>', limit: 0, severity: FindingSeverity.WARNING, description: '存在等待中的元数据锁' },

  // 表统计
  { name: 'table_fragmentation', metric: 'tables.*.*.fragmentation_percent', comparator: '>', limit: 20, severity: FindingSeverity.WARNING, description: '表碎片空间过多' },
  { name: 'table_without_index', metric: 'tables.*.*.index_count', comparator: '<', limit: 1, severity: FindingSeverity.WARNING, description: '表没有任何索引' },
  { name: 'large_table', metric: 'tables.*.*.data_bytes', comparator: '>', limit: GIB, severity: FindingSeverity.INFO, description: '表数据量超过 1 GiB' },
];
