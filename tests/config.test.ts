/**
 * 配置管理测试
 *
 * @description 测试默认值、范围校验、巡检深度与检查项解析、阈值覆盖、报告格式以及掩码输出
 * @since 1.0.0
 */

import { ConfigurationManager } from '../src/config.js';
import { DEFAULT_THRESHOLDS } from '../src/analysis/thresholds.js';
import { FindingSeverity, InspectionLevel } from '../src/types.js';

describe('ConfigurationManager', () => {
  describe('默认值', () => {
    test('空环境使用默认配置', () => {
      const config = new ConfigurationManager({});

      expect(config.database).toEqual({
        host: 'localhost',
        port: 3306,
        user: 'root',
        password: '',
        connectTimeout: 10,
        queryTimeout: 30,
        retryAttempts: 3,
        retryDelay: 1000,
        sslEnabled: false
      });
      expect(config.monitoring.level).toBe(InspectionLevel.ADVANCED);
      expect(config.monitoring.enabledChecks).toBeUndefined();
      expect(config.monitoring.enableTableStatistics).toBe(false);
      expect(config.monitoring.thresholds).toHaveLength(DEFAULT_THRESHOLDS.length);
      expect(config.monitoring.diskPath).toBe('/');
      expect(config.reasoning.enabled).toBe(false);
      expect(config.report).toEqual({
        outputDir: 'exports',
        formats: ['json', 'csv'],
        filePrefix: 'health_report',
        interactiveApproval: false
      });
    });
  });

  describe('数据库配置', () => {
    test('读取合法的数值与布尔值', () => {
      const config = new ConfigurationManager({
        MYSQL_HOST: 'db.internal',
        MYSQL_PORT: '3307',
        MYSQL_RETRY_ATTEMPTS: '5',
        MYSQL_RETRY_DELAY: '0',
        MYSQL_SSL: 'TRUE'
      });

      expect(config.database.host).toBe('db.internal');
      expect(config.database.port).toBe(3307);
      expect(config.database.retryAttempts).toBe(5);
      expect(config.database.retryDelay).toBe(0);
      expect(config.database.sslEnabled).toBe(true);
    });

    test('无效或超出范围的值回退到默认值', () => {
      const config = new ConfigurationManager({
        MYSQL_PORT: 'abc',
        MYSQL_CONNECT_TIMEOUT: '0',
        MYSQL_RETRY_ATTEMPTS: '99'
      });

      expect(config.database.port).toBe(3306);
      expect(config.database.connectTimeout).toBe(10);
      expect(config.database.retryAttempts).toBe(3);
    });
  });

  describe('巡检配置', () => {
    test.each([
      ['1', InspectionLevel.BASIC],
      ['basic', InspectionLevel.BASIC],
      ['Expert', InspectionLevel.EXPERT],
      ['3', InspectionLevel.EXPERT],
      ['deep', InspectionLevel.ADVANCED]
    ])('巡检深度 %s 解析为 %s', (value, expected) => {
      expect(new ConfigurationManager({ MONITOR_LEVEL: value }).monitoring.level).toBe(expected);
    });

    test('检查项列表去空白并转小写', () => {
      const config = new ConfigurationManager({ MONITOR_ENABLED_CHECKS: ' InnoDB, ,connections ' });

      expect(config.monitoring.enabledChecks).toEqual(['innodb', 'connections']);
    });

    test('按规则名覆盖阈值界限', () => {
      const config = new ConfigurationManager({
        MONITOR_THRESHOLDS: JSON.stringify({ connection_usage: 70, no_such_rule: 1 })
      });
      const rule = config.monitoring.thresholds.find(threshold => threshold.name === 'connection_usage');

      expect(config.monitoring.thresholds).toHaveLength(DEFAULT_THRESHOLDS.length);
      expect(rule?.limit).toBe(70);
      expect(rule?.metric).toBe('connections.usage_percent');
    });

    test('完整规则数组替换默认阈值', () => {
      const config = new ConfigurationManager({
        MONITOR_THRESHOLDS: JSON.stringify([
          { name: 'connection_usage', metric: 'connections.usage_percent', comparator: '>', limit: 80, severity: 'critical' }
        ])
      });

      expect(config.monitoring.thresholds).toEqual([
        {
          name: 'connection_usage',
          metric: 'connections.usage_percent',
          comparator: '>',
          limit: 80,
          severity: FindingSeverity.CRITICAL
        }
      ]);
    });

    test.each([
      ['不是 JSON', '{oops'],
      ['比较符无效', JSON.stringify([{ name: 'x', metric: 'a.b', comparator: '!=', limit: 1, severity: 'warning' }])],
      ['界限不是数字', JSON.stringify({ connection_usage: 'high' })]
    ])('%s 时使用默认阈值', (_label, value) => {
      const config = new ConfigurationManager({ MONITOR_THRESHOLDS: value });

      expect(config.monitoring.thresholds).toEqual([...DEFAULT_THRESHOLDS]);
    });
  });

  describe('推理服务与报告配置', () => {
    test('配置 API Key 时启用增强模式', () => {
      const config = new ConfigurationManager({
        ANTHROPIC_API_KEY: 'test-secret',
        REASONING_TEMPERATURE: '0.2',
        REASONING_TIMEOUT: '5000'
      });

      expect(config.reasoning.enabled).toBe(true);
      expect(config.reasoning.temperature).toBe(0.2);
      expect(config.reasoning.timeout).toBe(5000);
    });

    test('温度超出范围回退默认值', () => {
      expect(new ConfigurationManager({ REASONING_TEMPERATURE: '3' }).reasoning.temperature).toBe(0.7);
    });

    test('报告格式支持 xlsx 别名并忽略未知格式', () => {
      const config = new ConfigurationManager({ REPORT_FORMATS: 'text,xlsx,pdf,excel' });

      expect(config.report.formats).toEqual(['text', 'excel']);
    });

    test('全部格式无效时回退到 json 与 csv', () => {
      expect(new ConfigurationManager({ REPORT_FORMATS: 'pdf' }).report.formats).toEqual(['json', 'csv']);
    });
  });

  describe('诊断输出', () => {
    test('toObject 掩码密码与 API Key', () => {
      const config = new ConfigurationManager({ MYSQL_PASSWORD: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' });
      const object = config.toObject();

      expect(object.database.password).toBe('***');
      expect(object.reasoning.apiKey).toBe('***');
      expect(config.database.password).toBe('test-secret');
    });

    test('getSummary 返回字符串摘要', () => {
      const summary = new ConfigurationManager({ MONITOR_LEVEL: 'basic' }).getSummary();

      expect(summary.monitor_level).toBe('1');
      expect(summary.enabled_checks).toBe('(level default)');
      expect(summary.report_formats).toBe('json,csv');
    });
  });
});
