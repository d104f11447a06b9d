/**
 * 本地建议规则
 *
 * 静态规则表把发现项（指标名 + 严重级别）映射为建议文本，并在需要的实测值齐全时
 * 给出带本次实测值的修正语句。同一规则命中的发现项合并为一条建议，
 * 表级规则按表分别合并。没有规则覆盖的发现项得到一条通用建议。
 *
 * @fileoverview 本地建议规则表
 * @since 1.0.0
 */

import { matchMetric } from '../analysis/metricPattern.js';
import { numericValue } from '../analysis/derivedIndicators.js';
import {
  Finding,
  FindingSeverity,
  MetricSample,
  MetricValue,
  Recommendation,
  RecommendationPriority,
  SEVERITY_RANK
} from '../types.js';
import { NumberUtils } from '../utils/common.js';

const MIB = 1024 * 1024;

/**
 * 规则求值上下文
 */
export interface RuleContext {
  /** 本条建议合并的发现项 */
  readonly findings: readonly Finding[];
  /** 规则模式中 `*` 捕获的段，表级规则为 [库, 表] */
  readonly captures: readonly string[];
  /** 按名称取本次巡检的样本数值 */
  value(name: string): number | undefined;
  /** 按名称取本次巡检的文本样本 */
  text(name: string): string | undefined;
}

/**
 * 建议规则
 */
export interface RecommendationRule {
  readonly name: string;
  readonly subsystem: string;
  /** 指标名，可带 `*` */
  readonly metrics: readonly string[];
  /** 限定严重级别，未设置时不限 */
  readonly severities?: readonly FindingSeverity[];
  readonly advice: (context: RuleContext) => string;
  /** 返回 undefined 表示缺少生成语句所需的实测值 */
  readonly command?: (context: RuleContext) => string | undefined;
}

function quoteIdentifier(identifier: string): string {
  return `\`${identifier.replace(/`/g, '``')}\``;
}

interface TableIdentity {
  readonly schema: string;
  readonly table: string;
}

/**
 * 取表的原始库名与表名
 *
 * 指标名中的点号已被替换，不能直接还原为标识符，只认采集器另存的名称样本。
 */
function tableIdentity(context: RuleContext): TableIdentity | undefined {
  const [schemaSegment, tableSegment] = context.captures;
  if (schemaSegment === undefined || tableSegment === undefined) {
    return undefined;
  }
  const prefix = `tables.${schemaSegment}.${tableSegment}`;
  const schema = context.text(`${prefix}.schema_name`);
  const table = context.text(`${prefix}.table_name`);
  return schema !== undefined && table !== undefined ? { schema, table } : undefined;
}

function tableName(context: RuleContext): string {
  const identity = tableIdentity(context);
  if (identity) {
    return `${identity.schema}.${identity.table}`;
  }
  return `${context.captures[0] ?? '?'}.${context.captures[1] ?? '?'}`;
}

function hasFinding(context: RuleContext, metric: string): boolean {
  return context.findings.some(finding => finding.metric === metric);
}

export const LOCAL_RULES: readonly RecommendationRule[] = [
  {
    name: 'host_cpu',
    subsystem: 'system',
    metrics: ['system.cpu.usage_percent'],
    advice: () => 'CPU 使用率偏高：排查占用 CPU 的慢查询与突增的并发连接，必要时扩容主机'
  },
  {
    name: 'host_memory',
    subsystem: 'system',
    metrics: ['system.memory.usage_percent', 'system.swap.usage_percent'],
    advice: () => '主机内存紧张：核对 innodb_buffer_pool_size 等全局缓冲与每连接缓冲的总和，避免使用交换分区'
  },
  {
    name: 'host_disk',
    subsystem: 'system',
    metrics: ['system.disk.usage_percent'],
    advice: () => '磁盘空间不足：清理过期的二进制日志与慢查询日志，或扩容数据盘',
    command: () => 'PURGE BINARY LOGS BEFORE DATE_SUB(NOW(), INTERVAL 7 DAY)'
  },
  {
    name: 'connections',
    subsystem: 'connections',
    metrics: ['connections.usage_percent', 'connections.max_used_percent'],
    advice: () => '连接数接近上限：检查应用连接池大小与空闲连接回收，或适当提高 max_connections',
    command: context => {
      const max = context.value('connections.max_connections');
      return max === undefined || max <= 0 ? undefined : `SET GLOBAL max_connections = ${Math.ceil(max * 1.25)}`;
    }
  },
  {
    name: 'aborted_connects',
    subsystem: 'connections',
    metrics: ['connections.aborted_connect_percent'],
    advice: () => '异常中断的连接比例偏高：检查客户端认证失败、网络超时与 connect_timeout 设置'
  },
  {
    name: 'long_running_queries',
    subsystem: 'connections',
    metrics: ['connections.long_running_queries'],
    advice: () => '长时间运行的语句较多：通过进程列表定位这些语句，优化执行计划或在业务确认后终止'
  },
  {
    name: 'buffer_pool',
    subsystem: 'innodb',
    metrics: ['innodb.buffer_pool.hit_ratio', 'innodb.buffer_pool.dirty_percent'],
    advice: () => 'InnoDB 缓冲池效率偏低：增大 innodb_buffer_pool_size 使热点数据常驻内存，并关注脏页刷新速度',
    command: context => {
      const size = context.value('innodb.buffer_pool.size_bytes');
      if (!hasFinding(context, 'innodb.buffer_pool.hit_ratio') || size === undefined || size <= 0) {
        return undefined;
      }
      const target = Math.ceil((size * 1.5) / (128 * MIB)) * 128 * MIB;
      return `SET GLOBAL innodb_buffer_pool_size = ${target}`;
    }
  },
  {
    name: 'row_locks',
    subsystem: 'innodb',
    metrics: ['innodb.row_lock.current_waits', 'innodb.row_lock.time_avg'],
    advice: () => '行锁等待明显：缩短事务、为更新条件补充索引，并检查 innodb_lock_wait_timeout'
  },
  {
    name: 'query_cache_memory',
    subsystem: 'query_cache',
    metrics: ['query_cache.memory_usage_percent', 'query_cache.lowmem_prune_ratio'],
    severities: [FindingSeverity.WARNING, FindingSeverity.CRITICAL],
    advice: () => '查询缓存内存不足：增大 query_cache_size 以减少低内存淘汰',
    command: context => {
      const size = context.value('query_cache.size_bytes');
      return size === undefined || size <= 0 ? undefined : `SET GLOBAL query_cache_size = ${size * 2}`;
    }
  },
  {
    name: 'query_cache_fragmentation',
    subsystem: 'query_cache',
    metrics: ['query_cache.fragmentation_percent'],
    advice: () => '查询缓存碎片较多：整理查询缓存，碎片持续增长时减小 query_cache_min_res_unit',
    command: () => 'FLUSH QUERY CACHE'
  },
  {
    name: 'query_cache_efficiency',
    subsystem: 'query_cache',
    metrics: ['query_cache.hit_ratio', 'query_cache.memory_usage_percent'],
    advice: () => '查询缓存收益有限：写多读少的负载下可考虑关闭查询缓存（query_cache_type = 0）'
  },
  {
    name: 'slow_queries',
    subsystem: 'queries',
    metrics: ['slow_queries.per_minute', 'slow_queries.recent_count'],
    advice: () => '慢查询较多：分析慢查询日志，为高频慢语句补充索引或改写查询'
  },
  {
    name: 'statement_latency',
    subsystem: 'performance_schema',
    metrics: ['performance_schema.statements.high_latency_count'],
    advice: () => '存在平均延迟过高的语句：在 events_statements_summary_by_digest 中查看延迟最高的语句并优化执行计划'
  },
  {
    name: 'metadata_locks',
    subsystem: 'performance_schema',
    metrics: ['performance_schema.metadata_locks.pending'],
    advice: () => '存在等待中的元数据锁：检查未提交的长事务与并发 DDL，避免在业务高峰变更表结构'
  },
  {
    name: 'table_fragmentation',
    subsystem: 'tables',
    metrics: ['tables.*.*.fragmentation_percent'],
    advice: context => `表 ${tableName(context)} 碎片空间较多：在业务低峰期整理表空间`,
    command: context => {
      const identity = tableIdentity(context);
      return identity
        ? `OPTIMIZE TABLE ${quoteIdentifier(identity.schema)}.${quoteIdentifier(identity.table)}`
        : undefined;
    }
  },
  {
    name: 'table_without_index',
    subsystem: 'tables',
    metrics: ['tables.*.*.index_count'],
    advice: context => `表 ${tableName(context)} 没有任何索引：至少为其添加主键`
  },
  {
    name: 'large_table',
    subsystem: 'tables',
    metrics: ['tables.*.*.data_bytes'],
    advice: context => {
      const [schema, table] = context.captures;
      const bytes = context.value(`tables.${schema}.${table}.data_bytes`);
      const size = bytes === undefined ? '' : `（${NumberUtils.formatBytes(bytes)}）`;
      return `表 ${tableName(context)} 数据量较大${size}：考虑归档历史数据或按时间分区`;
    }
  }
];

const PRIORITY_BY_SEVERITY: Record<FindingSeverity, RecommendationPriority> = {
  [FindingSeverity.CRITICAL]: 'high',
  [FindingSeverity.WARNING]: 'medium',
  [FindingSeverity.INFO]: 'low'
};

export function priorityOf(findings: readonly Finding[]): RecommendationPriority {
  const severity = findings.reduce<FindingSeverity>(
    (max, finding) => (SEVERITY_RANK[finding.severity] > SEVERITY_RANK[max] ? finding.severity : max),
    FindingSeverity.INFO
  );
  return PRIORITY_BY_SEVERITY[severity];
}

interface Cluster {
  readonly key: string;
  readonly rule?: RecommendationRule;
  readonly captures: readonly string[];
  readonly findings: Finding[];
}

/**
 * 本地建议生成器
 *
 * @class LocalRecommender
 * @since 1.0.0
 */
export class LocalRecommender {
  constructor(private readonly rules: readonly RecommendationRule[] = LOCAL_RULES) {}

  /**
   * 为发现项生成建议
   *
   * 输出按合并组内的最高严重级别降序、再按首个指标名升序排列；
   * 编号在排序后依次分配，相同输入得到相同输出。
   */
  public recommend(findings: readonly Finding[], samples: readonly MetricSample[]): Recommendation[] {
    const values = new Map<string, MetricValue>();
    for (const sample of samples) {
      if (!values.has(sample.name)) {
        values.set(sample.name, sample.value);
      }
    }
    const value = (name: string): number | undefined => {
      const raw = values.get(name);
      return raw === undefined ? undefined : numericValue(raw);
    };
    const text = (name: string): string | undefined => {
      const raw = values.get(name);
      return typeof raw === 'string' ? raw : undefined;
    };

    const clusters = new Map<string, Cluster>();
    for (const finding of findings) {
      const { rule, captures } = this.match(finding);
      const key = rule ? `${rule.name}:${captures.join('.')}` : `generic:${finding.id}`;
      const cluster = clusters.get(key) ?? { key, rule, captures, findings: [] };
      cluster.findings.push(finding);
      clusters.set(key, cluster);
    }

    return [...clusters.values()]
      .sort(compareClusters)
      .map((cluster, index): Recommendation => {
        const context: RuleContext = { findings: cluster.findings, captures: cluster.captures, value, text };
        const command = cluster.rule?.command?.(context);
        return {
          id: `local-${index + 1}`,
          findingIds: cluster.findings.map(finding => finding.id),
          subsystem: cluster.rule?.subsystem ?? cluster.findings[0].collector,
          advice: cluster.rule ? cluster.rule.advice(context) : genericAdvice(cluster.findings[0]),
          ...(command !== undefined ? { command } : {}),
          priority: priorityOf(cluster.findings),
          source: 'local',
          approval: command !== undefined ? 'pending' : 'not-applicable'
        };
      });
  }

  private match(finding: Finding): { rule?: RecommendationRule; captures: readonly string[] } {
    for (const rule of this.rules) {
      if (rule.severities && !rule.severities.includes(finding.severity)) {
        continue;
      }
      for (const metric of rule.metrics) {
        const captures = matchMetric(metric, finding.metric);
        if (captures) {
          return { rule, captures };
        }
      }
    }
    return { captures: [] };
  }
}

function genericAdvice(finding: Finding): string {
  return `${finding.description}。请结合 ${finding.metric} 的变化趋势排查原因`;
}

function compareClusters(a: Cluster, b: Cluster): number {
  const rank = (cluster: Cluster): number =>
    Math.max(...cluster.findings.map(finding => SEVERITY_RANK[finding.severity]));
  const firstMetric = (cluster: Cluster): string =>
    cluster.findings.map(finding => finding.metric).sort()[0];

  const bySeverity = rank(b) - rank(a);
  if (bySeverity !== 0) {
    return bySeverity;
  }
  const metricA = firstMetric(a);
  const metricB = firstMetric(b);
  if (metricA < metricB) return -1;
  if (metricA > metricB) return 1;
  return 0;
}
