/**
 * 派生指标计算
 *
 * 从采集器返回的原始计数推导比率与百分比。所有除法遵循同一规则：
 * 分母为 0 时结果为 0，比率限制在 [0, 1]，百分比限制在 [0, 100]。
 * 派生样本归属于其输入所在的采集器，采集时间取输入中最晚的一个。
 *
 * @fileoverview 派生指标
 * @since 1.0.0
 */

import { MetricSample, MetricValue } from '../types.js';
import { NumberUtils } from '../utils/common.js';
import { fillPattern, isPattern, matchMetric } from './metricPattern.js';

type SampleLookup = ReadonlyMap<string, MetricSample>;

/**
 * 一条派生规则：输出名与输入名可以带 `*`，捕获段以第一个输入为准
 */
interface Derivation {
  readonly output: string;
  readonly inputs: readonly string[];
  readonly compute: (values: readonly number[]) => number;
  readonly when?: (lookup: SampleLookup) => boolean;
}

/**
 * 安全比率：分母为 0 时为 0，结果限制在 [0, 1]
 */
export function ratio(numerator: number, denominator: number): number {
  if (denominator === 0 || !Number.isFinite(numerator) || !Number.isFinite(denominator)) {
    return 0;
  }
  return NumberUtils.clamp(numerator / denominator, 0, 1);
}

/**
 * 安全百分比：ratio × 100，限制在 [0, 100]
 */
export function percent(numerator: number, denominator: number): number {
  return ratio(numerator, denominator) * 100;
}

/**
 * 取样本的数值；时长按毫秒，字符串不可比较
 */
export function numericValue(value: MetricValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    return undefined;
  }
  return value.milliseconds;
}

/**
 * 查询缓存关闭或大小为 0 时不推导其比率
 */
function queryCacheActive(lookup: SampleLookup): boolean {
  const type = lookup.get('query_cache.type')?.value;
  if (typeof type === 'string' && ['OFF', '0', 'UNAVAILABLE'].includes(type.toUpperCase())) {
    return false;
  }
  const size = lookup.get('query_cache.size_bytes')?.value;
  return !(typeof size === 'number' && size === 0);
}

const DERIVATIONS: readonly Derivation[] = [
  // 主机
  { output: 'system.memory.usage_percent', inputs: ['system.memory.used_bytes', 'system.memory.total_bytes'], compute: ([used, total]) => percent(used, total) },
  { output: 'system.swap.usage_percent', inputs: ['system.swap.used_bytes', 'system.swap.total_bytes'], compute: ([used, total]) => percent(used, total) },
  { output: 'system.disk.usage_percent', inputs: ['system.disk.used_bytes', 'system.disk.total_bytes'], compute: ([used, total]) => percent(used, total) },

  // 连接
  { output: 'connections.usage_percent', inputs: ['connections.threads_connected', 'connections.max_connections'], compute: ([current, max]) => percent(current, max) },
  { output: 'connections.max_used_percent', inputs: ['connections.max_used', 'connections.max_connections'], compute: ([used, max]) => percent(used, max) },
  { output: 'connections.aborted_connect_percent', inputs: ['connections.aborted_connects', 'connections.total'], compute: ([aborted, total]) => percent(aborted, total) },

  // InnoDB 缓冲池
  { output: 'innodb.buffer_pool.hit_ratio', inputs: ['innodb.buffer_pool.reads', 'innodb.buffer_pool.read_requests'], compute: ([reads, requests]) => 1 - ratio(reads, requests) },
  { output: 'innodb.buffer_pool.usage_percent', inputs: ['innodb.buffer_pool.pages_total', 'innodb.buffer_pool.pages_free'], compute: ([total, free]) => percent(total - free, total) },
  { output: 'innodb.buffer_pool.dirty_percent', inputs: ['innodb.buffer_pool.pages_dirty', 'innodb.buffer_pool.pages_total'], compute: ([dirty, total]) => percent(dirty, total) },

  // 查询缓存
  { output: 'query_cache.hit_ratio', inputs: ['query_cache.hits', 'query_cache.inserts'], compute: ([hits, inserts]) => ratio(hits, hits + inserts), when: queryCacheActive },
  { output: 'query_cache.fragmentation_percent', inputs: ['query_cache.free_blocks', 'query_cache.total_blocks'], compute: ([free, total]) => percent(free, total), when: queryCacheActive },
  { output: 'query_cache.memory_usage_percent', inputs: ['query_cache.size_bytes', 'query_cache.free_memory_bytes'], compute: ([size, free]) => percent(size - free, size), when: queryCacheActive },
  { output: 'query_cache.lowmem_prune_ratio', inputs: ['query_cache.lowmem_prunes', 'query_cache.inserts'], compute: ([prunes, inserts]) => ratio(prunes, inserts), when: queryCacheActive },

  // 慢查询：运行时间按分钟折算
  {
    output: 'slow_queries.per_minute',
    inputs: ['slow_queries.total', 'slow_queries.uptime'],
    compute: ([total, uptimeMs]) => (uptimeMs > 0 ? Math.max(0, total) / (uptimeMs / 60000) : 0)
  },

  // 表
  { output: 'tables.*.*.fragmentation_percent', inputs: ['tables.*.*.free_bytes', 'tables.*.*.data_bytes'], compute: ([free, data]) => percent(free, data) }
];

function latest(samples: readonly MetricSample[]): string {
  return samples.reduce((acc, sample) => (sample.capturedAt > acc ? sample.capturedAt : acc), samples[0].capturedAt);
}

function apply(
  derivation: Derivation,
  captures: readonly string[],
  lookup: SampleLookup
): MetricSample | undefined {
  const output = fillPattern(derivation.output, captures);
  if (lookup.has(output)) {
    return undefined;
  }

  const inputs: MetricSample[] = [];
  const values: number[] = [];
  for (const inputName of derivation.inputs) {
    const sample = lookup.get(fillPattern(inputName, captures));
    const value = sample ? numericValue(sample.value) : undefined;
    if (!sample || value === undefined) {
      return undefined;
    }
    inputs.push(sample);
    values.push(value);
  }

  // 只在同一采集器的样本之间推导
  const collector = inputs[0].collector;
  if (inputs.some(sample => sample.collector !== collector)) {
    return undefined;
  }

  return {
    name: output,
    value: derivation.compute(values),
    collector,
    capturedAt: latest(inputs),
    derived: true
  };
}

/**
 * 计算派生指标
 *
 * 输入缺失或不是数值时对应指标不产生；已由采集器直接给出的同名指标不覆盖。
 *
 * @param samples - 原始样本
 * @returns 新增的派生样本，顺序由规则表与输入顺序决定
 */
export function deriveIndicators(samples: readonly MetricSample[]): MetricSample[] {
  const lookup = new Map<string, MetricSample>();
  for (const sample of samples) {
    if (!lookup.has(sample.name)) {
      lookup.set(sample.name, sample);
    }
  }

  const derived: MetricSample[] = [];
  for (const derivation of DERIVATIONS) {
    if (derivation.when && !derivation.when(lookup)) {
      continue;
    }

    if (!isPattern(derivation.inputs[0])) {
      const sample = apply(derivation, [], lookup);
      if (sample) {
        derived.push(sample);
      }
      continue;
    }

    for (const candidate of lookup.keys()) {
      const captures = matchMetric(derivation.inputs[0], candidate);
      if (!captures) {
        continue;
      }
      const sample = apply(derivation, captures, lookup);
      if (sample) {
        derived.push(sample);
      }
    }
  }

  return derived;
}
