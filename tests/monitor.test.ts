/**
 * 巡检编排测试
 *
 * @description 端到端测试一次巡检：连接失败、Basic 等级的连接使用率告警、
 *              表统计跳过、采集器失败降级、审批以及命令行入口
 * @since 1.0.0
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { BaseCollector } from '../src/collectors/baseCollector.js';
import { CollectorRegistry } from '../src/collectors/collectorRegistry.js';
import { ConfigurationManager } from '../src/config.js';
import { Connector, DriverConnection, MySQLConnector } from '../src/connection.js';
import { main } from '../src/index.js';
import { HealthMonitor, HealthMonitorConfig } from '../src/monitor.js';
import { RecommendationPipeline } from '../src/recommendations/recommendationPipeline.js';
import {
  ConnectionError,
  ErrorCategory,
  FindingSeverity,
  InspectionLevel,
  MetricSample,
  QueryError,
  Threshold
} from '../src/types.js';
import { ScriptedSession, ScriptStep, variableRows } from './helpers/scriptedSession.js';

jest.mock('systeminformation', () => ({
  currentLoad: jest.fn(() => Promise.resolve({ currentLoad: 12, cpus: [{}, {}] })),
  mem: jest.fn(() => Promise.resolve({ total: 16000, available: 8000, swaptotal: 0, swapused: 0 })),
  fsSize: jest.fn(() => Promise.resolve([{ mount: '/', size: 1000, used: 500 }]))
}));

let mockCreateConnection: () => Promise<DriverConnection> = () => Promise.reject(new Error('not configured'));

jest.mock('mysql2/promise', () => ({
  createConnection: () => mockCreateConnection()
}));

const GENERATED_AT = '2024-03-05T07:08:09.000Z';

const CONNECTION_USAGE: Threshold = {
  name: 'connection_usage',
  metric: 'connections.usage_percent',
  comparator: '>',
  limit: 80,
  severity: FindingSeverity.WARNING
};

function connectionScript(connected: number): ScriptStep[] {
  return [
    ['SELECT VERSION()', [{ version: '8.0.36' }]],
    ['SHOW GLOBAL STATUS', variableRows({
      Threads_connected: connected,
      Threads_running: 2,
      Max_used_connections: 60,
      Aborted_connects: 0,
      Aborted_clients: 0,
      Connections: 500,
      Uptime: 7200,
      Innodb_buffer_pool_read_requests: 1000,
      Innodb_buffer_pool_reads: 10,
      Innodb_buffer_pool_pages_total: 100,
      Innodb_buffer_pool_pages_free: 10,
      Innodb_buffer_pool_pages_dirty: 1,
      Innodb_row_lock_current_waits: 0,
      Slow_queries: 0
    })],
    ['SHOW GLOBAL VARIABLES', variableRows({
      max_connections: 100,
      wait_timeout: 28800,
      innodb_buffer_pool_size: 134217728,
      slow_query_log: 'OFF',
      long_query_time: 10,
      log_output: 'FILE'
    })],
    ['SHOW FULL PROCESSLIST', []]
  ];
}

function monitorConfig(monitoring: Partial<HealthMonitorConfig['monitoring']>): HealthMonitorConfig {
  const defaults = new ConfigurationManager({});
  return {
    database: { ...defaults.database, host: 'db.test', user: 'monitor', password: 'test-secret', retryDelay: 0 },
    monitoring: { ...defaults.monitoring, ...monitoring }
  };
}

function connectorFor(session: ScriptedSession): Connector {
  return { connect: () => Promise.resolve(session) };
}

const clock = (): Date => new Date(GENERATED_AT);

describe('HealthMonitor', () => {
  test('连接重试 3 次都失败时抛出 ConnectionError，不生成报告也不生成建议', async () => {
    const factory = jest.fn<Promise<DriverConnection>, []>()
      .mockRejectedValue(Object.assign(new Error('connect ECONNREFUSED 10.0.0.1:3306'), { code: 'ECONNREFUSED' }));
    const pipeline = new RecommendationPipeline();
    const recommend = jest.spyOn(pipeline, 'recommend');
    const monitor = new HealthMonitor(monitorConfig({ level: InspectionLevel.BASIC }), {
      connector: new MySQLConnector(factory),
      pipeline,
      clock
    });

    const error: unknown = await monitor.run().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ attempts: 3 });
    expect(factory).toHaveBeenCalledTimes(3);
    expect(recommend).not.toHaveBeenCalled();
  });

  test('Basic 等级连接使用率 95% 产生一条发现项与一条待审批建议', async () => {
    const session = new ScriptedSession(connectionScript(95));
    const monitor = new HealthMonitor(
      monitorConfig({ level: InspectionLevel.BASIC, thresholds: [CONNECTION_USAGE] }),
      { connector: connectorFor(session), clock }
    );

    const report = await monitor.run();

    expect(report.generatedAt).toBe(GENERATED_AT);
    expect(report.connection).toEqual({ host: 'db.test', port: 3306, user: 'monitor' });
    expect(report.checks.resolved).toEqual(['system_resources', 'connection_stats']);
    expect(report.degraded).toBe(false);
    expect(report.findings).toEqual([
      {
        id: 'connections.usage_percent#warning',
        metric: 'connections.usage_percent',
        severity: FindingSeverity.WARNING,
        value: 95,
        limit: 80,
        comparator: '>',
        threshold: 'connection_usage',
        collector: 'connection_stats',
        description: 'connection_usage：当前值 95，阈值 > 80'
      }
    ]);
    expect(report.recommendations).toHaveLength(1);
    expect(report.recommendations[0]).toMatchObject({
      findingIds: ['connections.usage_percent#warning'],
      command: 'SET GLOBAL max_connections = 125',
      source: 'local',
      approval: 'pending'
    });
    expect(report.recommendationMode).toBe('local');
    expect(session.closed).toBe(true);
  });

  test('Advanced 等级启用表统计时跳过并说明原因，不读取表元数据', async () => {
    const session = new ScriptedSession(connectionScript(10));
    const monitor = new HealthMonitor(
      monitorConfig({ level: InspectionLevel.ADVANCED, enableTableStatistics: true }),
      { connector: connectorFor(session), clock }
    );

    const report = await monitor.run();

    expect(report.checks.skipped).toEqual([{ check: 'table_statistics', reason: '表统计需要 Expert 等级' }]);
    expect(report.sections.map(section => section.collector)).toEqual([
      'system_resources',
      'connection_stats',
      'innodb',
      'query_cache',
      'slow_queries'
    ]);
    expect(report.degraded).toBe(false);
    expect(report.findings).toEqual([]);
    const sampleNames = report.sections.flatMap(section => section.samples.map(sample => sample.name));
    expect(sampleNames.some(name => name.startsWith('tables.'))).toBe(false);
    expect(session.statements.some(statement => statement.includes('information_schema'))).toBe(false);
  });

  test('采集器失败时对应章节降级，其余发现项照常产生', async () => {
    class DeniedInnoDBCollector extends BaseCollector {
      public readonly name = 'innodb' as const;

      public async collect(): Promise<MetricSample[]> {
        throw new QueryError('查询失败: [访问被拒绝] SHOW GLOBAL STATUS', ErrorCategory.ACCESS_DENIED, 'SHOW GLOBAL STATUS');
      }
    }
    const registry = new CollectorRegistry();
    registry.register('innodb', DeniedInnoDBCollector);
    const monitor = new HealthMonitor(
      monitorConfig({
        level: InspectionLevel.ADVANCED,
        enabledChecks: ['connection_stats', 'innodb'],
        thresholds: [CONNECTION_USAGE]
      }),
      { connector: connectorFor(new ScriptedSession(connectionScript(95))), registry, clock }
    );

    const report = await monitor.run();

    expect(report.degraded).toBe(true);
    expect(report.sections.map(section => [section.collector, section.status])).toEqual([
      ['connection_stats', 'ok'],
      ['innodb', 'failed']
    ]);
    expect(report.sections[1].error).toEqual({
      category: ErrorCategory.ACCESS_DENIED,
      message: '查询失败: [访问被拒绝] SHOW GLOBAL STATUS'
    });
    expect(report.findings.map(finding => finding.id)).toEqual(['connections.usage_percent#warning']);
  });

  test('提供确认方时待审批建议被批准', async () => {
    const review = jest.fn(() => Promise.resolve<'approved'>('approved'));
    const monitor = new HealthMonitor(
      monitorConfig({ level: InspectionLevel.BASIC, thresholds: [CONNECTION_USAGE] }),
      {
        connector: connectorFor(new ScriptedSession(connectionScript(95))),
        approvalGate: { review },
        clock
      }
    );

    const report = await monitor.run();

    expect(review).toHaveBeenCalledTimes(1);
    expect(report.recommendations[0].approval).toBe('approved');
  });
});

describe('main', () => {
  let tempDir: string;
  let stdout: jest.SpyInstance;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'monitor-main-test-'));
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    stdout.mockRestore();
    mockCreateConnection = () => Promise.reject(new Error('not configured'));
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function env(overrides: Record<string, string>): NodeJS.ProcessEnv {
    return {
      MYSQL_HOST: 'db.test',
      MYSQL_USER: 'monitor',
      MYSQL_PASSWORD: 'test-secret',
      MYSQL_RETRY_DELAY: '0',
      MONITOR_LEVEL: 'basic',
      REPORT_FORMATS: 'json',
      REPORT_OUTPUT_DIR: tempDir,
      ...overrides
    };
  }

  test('巡检成功时输出文本报告、写入 JSON 文件并返回 0', async () => {
    const session = new ScriptedSession(connectionScript(95));
    const connection: DriverConnection = {
      query: async ({ sql }) => [await session.execute(sql), []],
      end: () => Promise.resolve(),
      destroy: () => undefined
    };
    mockCreateConnection = () => Promise.resolve(connection);

    const code = await main(env({}));

    expect(code).toBe(0);
    expect(String(stdout.mock.calls[0][0]).startsWith('MySQL 健康巡检报告\n')).toBe(true);
    const files = await fs.readdir(tempDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^health_report_\d{8}_\d{6}\.json$/);
    const parsed: unknown = JSON.parse(await fs.readFile(path.join(tempDir, files[0]), 'utf8'));
    expect(parsed).toMatchObject({
      levelName: 'basic',
      findings: [{ id: 'connections.usage_percent#warning' }]
    });
  });

  test('连接失败时返回 1 且不写任何文件', async () => {
    mockCreateConnection = () => Promise.reject(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

    const code = await main(env({ MYSQL_RETRY_ATTEMPTS: '2' }));

    expect(code).toBe(1);
    expect(stdout).not.toHaveBeenCalled();
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
