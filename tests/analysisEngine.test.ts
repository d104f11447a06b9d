/**
 * 分析引擎测试
 *
 * @description 测试指标名匹配、派生指标的安全除法与条件、阈值评估、最严重规则选择与排序
 * @since 1.0.0
 */

import { AnalysisEngine } from '../src/analysis/analysisEngine.js';
import { deriveIndicators, percent, ratio } from '../src/analysis/derivedIndicators.js';
import { fillPattern, matchMetric } from '../src/analysis/metricPattern.js';
import { DEFAULT_THRESHOLDS } from '../src/analysis/thresholds.js';
import { CheckName, FindingSeverity, MetricSample, MetricValue, Threshold } from '../src/types.js';

const CAPTURED_AT = '2024-03-05T07:08:00.000Z';

function sample(
  name: string,
  value: MetricValue,
  collector: CheckName = 'connection_stats',
  capturedAt: string = CAPTURED_AT
): MetricSample {
  return { name, value, collector, capturedAt };
}

function derivedValue(samples: readonly MetricSample[], name: string): MetricValue | undefined {
  return deriveIndicators(samples).find(entry => entry.name === name)?.value;
}

describe('metricPattern', () => {
  test('星号恰好匹配一个段', () => {
    expect(matchMetric('tables.*.*.data_bytes', 'tables.shop.orders.data_bytes')).toEqual(['shop', 'orders']);
    expect(matchMetric('tables.*.*.data_bytes', 'tables.shop.data_bytes')).toBeUndefined();
    expect(matchMetric('connections.usage_percent', 'connections.usage_percent')).toEqual([]);
    expect(matchMetric('connections.usage_percent', 'connectionsXusage_percent')).toBeUndefined();
  });

  test('用捕获段填充模式', () => {
    expect(fillPattern('tables.*.*.free_bytes', ['shop', 'orders'])).toBe('tables.shop.orders.free_bytes');
  });
});

describe('derivedIndicators', () => {
  test('安全除法：分母为 0 得 0，结果被限制在区间内', () => {
    expect(ratio(1, 0)).toBe(0);
    expect(ratio(5, 2)).toBe(1);
    expect(ratio(-1, 2)).toBe(0);
    expect(percent(1, 4)).toBe(25);
    expect(percent(3, 0)).toBe(0);
  });

  test('连接使用率取输入中最晚的采集时间并标记为派生', () => {
    const derived = deriveIndicators([
      sample('connections.threads_connected', 95, 'connection_stats', '2024-03-05T07:08:01.000Z'),
      sample('connections.max_connections', 100, 'connection_stats', '2024-03-05T07:08:02.000Z')
    ]);

    expect(derived).toEqual([
      {
        name: 'connections.usage_percent',
        value: 95,
        collector: 'connection_stats',
        capturedAt: '2024-03-05T07:08:02.000Z',
        derived: true
      }
    ]);
  });

  test('没有读请求时缓冲池命中率为 1', () => {
    const samples = [
      sample('innodb.buffer_pool.reads', 0, 'innodb'),
      sample('innodb.buffer_pool.read_requests', 0, 'innodb')
    ];

    expect(derivedValue(samples, 'innodb.buffer_pool.hit_ratio')).toBe(1);
  });

  test('缓冲池命中率按物理读占比计算', () => {
    const samples = [
      sample('innodb.buffer_pool.reads', 100, 'innodb'),
      sample('innodb.buffer_pool.read_requests', 10000, 'innodb')
    ];

    expect(derivedValue(samples, 'innodb.buffer_pool.hit_ratio')).toBeCloseTo(0.99, 10);
  });

  describe('查询缓存', () => {
    const counters = [
      sample('query_cache.hits', 300, 'query_cache'),
      sample('query_cache.inserts', 100, 'query_cache')
    ];

    test('开启时计算命中率', () => {
      const samples = [sample('query_cache.type', 'ON', 'query_cache'), ...counters];

      expect(derivedValue(samples, 'query_cache.hit_ratio')).toBe(0.75);
    });

    test.each([
      ['类型为 OFF', [sample('query_cache.type', 'OFF', 'query_cache')]],
      ['大小为 0', [sample('query_cache.type', 'ON', 'query_cache'), sample('query_cache.size_bytes', 0, 'query_cache')]]
    ])('%s 时不推导', (_label, extra) => {
      expect(derivedValue([...extra, ...counters], 'query_cache.hit_ratio')).toBeUndefined();
    });
  });

  test('慢查询按运行分钟折算', () => {
    const samples = [
      sample('slow_queries.total', 120, 'slow_queries'),
      sample('slow_queries.uptime', { milliseconds: 600000 }, 'slow_queries')
    ];

    expect(derivedValue(samples, 'slow_queries.per_minute')).toBe(12);
  });

  test('按表推导碎片率', () => {
    const samples = [
      sample('tables.shop.orders.free_bytes', 600, 'table_statistics'),
      sample('tables.shop.orders.data_bytes', 2000, 'table_statistics'),
      sample('tables.shop.users.free_bytes', 0, 'table_statistics'),
      sample('tables.shop.users.data_bytes', 0, 'table_statistics')
    ];

    expect(derivedValue(samples, 'tables.shop.orders.fragmentation_percent')).toBe(30);
    expect(derivedValue(samples, 'tables.shop.users.fragmentation_percent')).toBe(0);
  });

  test('输入缺失、不是数值或来自不同采集器时不推导', () => {
    expect(deriveIndicators([sample('connections.threads_connected', 95)])).toEqual([]);
    expect(deriveIndicators([
      sample('connections.threads_connected', 'many'),
      sample('connections.max_connections', 100)
    ])).toEqual([]);
    expect(deriveIndicators([
      sample('connections.threads_connected', 95),
      sample('connections.max_connections', 100, 'innodb')
    ])).toEqual([]);
  });

  test('采集器已给出的同名指标不被覆盖', () => {
    const samples = [
      sample('connections.threads_connected', 95),
      sample('connections.max_connections', 100),
      sample('connections.usage_percent', 10)
    ];

    expect(deriveIndicators(samples)).toEqual([]);
  });
});

describe('AnalysisEngine', () => {
  const connectionSamples = (connected: number): MetricSample[] => [
    sample('connections.threads_connected', connected),
    sample('connections.max_connections', 100)
  ];

  test('连接使用率 95% 在默认阈值下只产生警告', () => {
    const { samples, findings } = AnalysisEngine.analyze(connectionSamples(95), DEFAULT_THRESHOLDS);

    expect(samples).toHaveLength(3);
    expect(findings).toEqual([
      {
        id: 'connections.usage_percent#warning',
        metric: 'connections.usage_percent',
        severity: FindingSeverity.WARNING,
        value: 95,
        limit: 80,
        comparator: '>',
        threshold: 'connection_usage',
        collector: 'connection_stats',
        description: '连接使用率过高：当前值 95，阈值 > 80'
      }
    ]);
  });

  test('同一指标多条规则触发时只保留最严重的一条', () => {
    const { findings } = AnalysisEngine.analyze(connectionSamples(96), DEFAULT_THRESHOLDS);

    expect(findings.map(finding => finding.id)).toEqual(['connections.usage_percent#critical']);
    expect(findings[0].threshold).toBe('connection_usage_critical');
  });

  test('没有样本时没有发现项', () => {
    expect(AnalysisEngine.analyze([], DEFAULT_THRESHOLDS)).toEqual({ samples: [], findings: [] });
  });

  test('时长按毫秒比较，字符串样本不参与评估', () => {
    const thresholds: Threshold[] = [
      { name: 'lock_wait', metric: 'innodb.row_lock.time_avg', comparator: '>', limit: 500, severity: FindingSeverity.WARNING },
      { name: 'text', metric: 'server.version', comparator: '>', limit: 0, severity: FindingSeverity.CRITICAL }
    ];

    const findings = AnalysisEngine.evaluate([
      sample('innodb.row_lock.time_avg', { milliseconds: 600 }, 'innodb'),
      sample('server.version', '8.0.36')
    ], thresholds);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ metric: 'innodb.row_lock.time_avg', value: 600, description: 'lock_wait：当前值 600，阈值 > 500' });
  });

  test('按严重级别降序、指标名升序排列', () => {
    const thresholds: Threshold[] = [
      { name: 'c', metric: 'c.metric', comparator: '>=', limit: 10, severity: FindingSeverity.WARNING },
      { name: 'b', metric: 'b.metric', comparator: '>=', limit: 10, severity: FindingSeverity.CRITICAL },
      { name: 'a', metric: 'a.metric', comparator: '<=', limit: 10, severity: FindingSeverity.WARNING },
      { name: 'd', metric: 'd.metric', comparator: '<', limit: 10, severity: FindingSeverity.INFO }
    ];
    const samples = [sample('d.metric', 1), sample('c.metric', 10), sample('b.metric', 10), sample('a.metric', 10)];

    const findings = AnalysisEngine.evaluate(samples, thresholds);

    expect(findings.map(finding => finding.metric)).toEqual(['b.metric', 'a.metric', 'c.metric', 'd.metric']);
  });

  test('相同输入得到相同输出', () => {
    const samples = [
      ...connectionSamples(90),
      sample('system.disk.used_bytes', 980, 'system_resources'),
      sample('system.disk.total_bytes', 1000, 'system_resources')
    ];

    expect(AnalysisEngine.analyze(samples, DEFAULT_THRESHOLDS)).toEqual(AnalysisEngine.analyze(samples, DEFAULT_THRESHOLDS));
    expect(AnalysisEngine.analyze(samples, DEFAULT_THRESHOLDS).findings.map(finding => finding.id)).toEqual([
      'system.disk.usage_percent#critical',
      'connections.usage_percent#warning'
    ]);
  });

  test.each([
    ['>', 5, 5, false],
    ['>=', 5, 5, true],
    ['<', 4, 5, true],
    ['<=', 6, 5, false]
  ] as const)('compare %s: %d 对 %d 为 %s', (comparator, value, limit, expected) => {
    expect(AnalysisEngine.compare(value, comparator, limit)).toBe(expected);
  });
});
