/**
 * 配置管理系统
 *
 * 从环境变量（经 dotenv 从 .env 加载）读取数据库连接、巡检深度与阈值、
 * 外部推理服务以及报告输出配置，带范围校验并回退到默认值。
 *
 * @fileoverview 巡检配置管理
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { DefaultConfig, StringConstants } from './constants.js';
import { logger } from './logger.js';
import {
  FindingSeverity,
  InspectionLevel,
  REPORT_FORMATS,
  ReportFormat,
  Threshold
} from './types.js';
import { DEFAULT_THRESHOLDS } from './analysis/thresholds.js';

// 加载环境变量配置
config();

/**
 * 数据库配置接口
 *
 * @interface DatabaseConfig
 * @since 1.0.0
 *
 * @example
 * const dbConfig: DatabaseConfig = {
 *   host: 'localhost',
 *   port: 3306,
 *   user: 'monitor',
 *   password: 'test-secret',
 *   connectTimeout: 10,
 *   queryTimeout: 30,
 *   retryAttempts: 3,
 *   retryDelay: 1000,
 *   sslEnabled: false
 * };
 */
export interface DatabaseConfig {
  /** MySQL 服务器主机名或 IP 地址 */
  host: string;

  /** MySQL 服务器端口号（默认：3306） */
  port: number;

  /** 用于身份验证的数据库用户名 */
  user: string;

  /** 用于身份验证的数据库密码 */
  password: string;

  /** 单次连接尝试超时时间（秒） */
  connectTimeout: number;

  /** 单条语句超时时间（秒） */
  queryTimeout: number;

  /** 连接尝试次数（包括首次） */
  retryAttempts: number;

  /** 重试基础延迟（毫秒） */
  retryDelay: number;

  /** 是否启用 SSL/TLS 加密 */
  sslEnabled: boolean;
}

/**
 * 巡检配置接口
 */
export interface MonitoringConfig {
  /** 巡检深度 */
  level: InspectionLevel;

  /** 显式启用的检查项，未设置时使用等级默认集合 */
  enabledChecks?: string[];

  /** 是否启用表统计（还需 Expert 等级） */
  enableTableStatistics: boolean;

  /** 生效的阈值规则 */
  thresholds: Threshold[];

  /** 统计磁盘使用率的挂载点 */
  diskPath: string;

  /** 表统计最多读取的表数 */
  maxTables: number;

  /** 语句平均延迟的告警界限（毫秒） */
  highLatencyMs: number;
}

/**
 * 外部推理服务配置接口
 */
export interface ReasoningConfig {
  /** 是否启用增强建议（配置了 API Key 时为 true） */
  enabled: boolean;
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** 请求超时（毫秒） */
  timeout: number;
  baseUrl: string;
  /** 请求体最大字节数 */
  maxRequestBytes: number;
}

/**
 * 报告输出配置接口
 */
export interface ReportConfig {
  outputDir: string;
  formats: ReportFormat[];
  filePrefix: string;
  /** 是否在终端逐条确认建议命令 */
  interactiveApproval: boolean;
}

const ThresholdSchema = z.object({
  name: z.string().min(1),
  metric: z.string().min(1),
  comparator: z.enum(['>', '<', '>=', '<=']),
  limit: z.number().finite(),
  severity: z.nativeEnum(FindingSeverity),
  description: z.string().optional()
});

/**
 * 阈值覆盖：完整规则数组，或按规则名覆盖界限值
 */
const ThresholdOverridesSchema = z.union([
  z.array(ThresholdSchema).min(1),
  z.record(z.string(), z.number().finite())
]);

/**
 * 巡检深度的数字与名称写法
 */
const LEVEL_ALIASES: Record<string, InspectionLevel> = {
  '1': InspectionLevel.BASIC,
  '2': InspectionLevel.ADVANCED,
  '3': InspectionLevel.EXPERT,
  basic: InspectionLevel.BASIC,
  advanced: InspectionLevel.ADVANCED,
  expert: InspectionLevel.EXPERT
};

/**
 * 配置管理器类
 *
 * @class ConfigurationManager
 * @since 1.0.0
 *
 * @example
 * const configManager = new ConfigurationManager();
 * const { host, port } = configManager.database;
 */
export class ConfigurationManager {
  /** 数据库连接配置 */
  public database: DatabaseConfig;

  /** 巡检配置 */
  public monitoring: MonitoringConfig;

  /** 外部推理服务配置 */
  public reasoning: ReasoningConfig;

  /** 报告输出配置 */
  public report: ReportConfig;

  /**
   * @param {NodeJS.ProcessEnv} [env=process.env] - 配置来源
   */
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.database = this.loadDatabaseConfig();
    this.monitoring = this.loadMonitoringConfig();
    this.reasoning = this.loadReasoningConfig();
    this.report = this.loadReportConfig();
  }

  private loadDatabaseConfig(): DatabaseConfig {
    return {
      host: this.env[StringConstants.ENV_MYSQL_HOST] || StringConstants.DEFAULT_HOST,
      port: this.parseIntWithValidation(
        this.env[StringConstants.ENV_MYSQL_PORT],
        DefaultConfig.MYSQL_PORT,
        1,
        65535,
        'MySQL端口'
      ),
      user: this.env[StringConstants.ENV_MYSQL_USER] || StringConstants.DEFAULT_USER,
      password: this.env[StringConstants.ENV_MYSQL_PASSWORD] || StringConstants.DEFAULT_PASSWORD,
      connectTimeout: this.parseIntWithValidation(
        this.env[StringConstants.ENV_CONNECT_TIMEOUT],
        DefaultConfig.CONNECT_TIMEOUT,
        1,
        300,
        '连接超时'
      ),
      queryTimeout: this.parseIntWithValidation(
        this.env[StringConstants.ENV_QUERY_TIMEOUT],
        DefaultConfig.QUERY_TIMEOUT,
        1,
        3600,
        '查询超时'
      ),
      retryAttempts: this.parseIntWithValidation(
        this.env[StringConstants.ENV_RETRY_ATTEMPTS],
        DefaultConfig.RETRY_ATTEMPTS,
        1,
        10,
        '连接尝试次数'
      ),
      retryDelay: this.parseIntWithValidation(
        this.env[StringConstants.ENV_RETRY_DELAY],
        DefaultConfig.RETRY_DELAY,
        0,
        60000,
        '重试延迟'
      ),
      sslEnabled: this.parseBoolean(this.env[StringConstants.ENV_MYSQL_SSL])
    };
  }

  private loadMonitoringConfig(): MonitoringConfig {
    return {
      level: this.parseLevel(this.env[StringConstants.ENV_MONITOR_LEVEL]),
      enabledChecks: this.parseList(this.env[StringConstants.ENV_ENABLED_CHECKS]),
      enableTableStatistics: this.parseBoolean(this.env[StringConstants.ENV_ENABLE_TABLES]),
      thresholds: this.parseThresholds(this.env[StringConstants.ENV_THRESHOLDS]),
      diskPath: this.env[StringConstants.ENV_DISK_PATH] || StringConstants.DEFAULT_DISK_PATH,
      maxTables: this.parseIntWithValidation(
        this.env[StringConstants.ENV_MAX_TABLES],
        DefaultConfig.MAX_TABLES,
        1,
        100000,
        '表统计上限'
      ),
      highLatencyMs: this.parseIntWithValidation(
        this.env[StringConstants.ENV_HIGH_LATENCY_MS],
        DefaultConfig.HIGH_LATENCY_MS,
        1,
        3600000,
        '高延迟阈值'
      )
    };
  }

  private loadReasoningConfig(): ReasoningConfig {
    const apiKey = this.env[StringConstants.ENV_REASONING_API_KEY] || '';
    const temperature = Number(this.env[StringConstants.ENV_REASONING_TEMPERATURE] ?? DefaultConfig.REASONING_TEMPERATURE);

    return {
      enabled: apiKey.length > 0,
      apiKey,
      model: this.env[StringConstants.ENV_REASONING_MODEL] || StringConstants.DEFAULT_REASONING_MODEL,
      maxTokens: this.parseIntWithValidation(
        this.env[StringConstants.ENV_REASONING_MAX_TOKENS],
        DefaultConfig.REASONING_MAX_TOKENS,
        1,
        200000,
        '推理服务最大令牌数'
      ),
      temperature: Number.isFinite(temperature) && temperature >= 0 && temperature <= 1
        ? temperature
        : DefaultConfig.REASONING_TEMPERATURE,
      timeout: this.parseIntWithValidation(
        this.env[StringConstants.ENV_REASONING_TIMEOUT],
        DefaultConfig.REASONING_TIMEOUT,
        100,
        600000,
        '推理服务超时'
      ),
      baseUrl: this.env[StringConstants.ENV_REASONING_BASE_URL] || StringConstants.DEFAULT_REASONING_BASE_URL,
      maxRequestBytes: this.parseIntWithValidation(
        this.env[StringConstants.ENV_REASONING_MAX_REQUEST_BYTES],
        DefaultConfig.REASONING_MAX_REQUEST_BYTES,
        1024,
        1048576,
        '推理请求大小上限'
      )
    };
  }

  private loadReportConfig(): ReportConfig {
    return {
      outputDir: this.env[StringConstants.ENV_REPORT_OUTPUT_DIR] || StringConstants.DEFAULT_OUTPUT_DIR,
      formats: this.parseFormats(this.env[StringConstants.ENV_REPORT_FORMATS]),
      filePrefix: this.env[StringConstants.ENV_REPORT_FILE_PREFIX] || StringConstants.DEFAULT_FILE_PREFIX,
      interactiveApproval: this.parseBoolean(this.env[StringConstants.ENV_INTERACTIVE_APPROVAL])
    };
  }

  /**
   * 导出配置用于诊断，密码与 API Key 被掩码
   *
   * @public
   * @returns {object} 清理后的配置对象
   */
  public toObject(): {
    database: DatabaseConfig;
    monitoring: MonitoringConfig;
    reasoning: ReasoningConfig;
    report: ReportConfig;
  } {
    return {
      database: { ...this.database, password: StringConstants.MASK },
      monitoring: { ...this.monitoring, thresholds: [...this.monitoring.thresholds] },
      reasoning: { ...this.reasoning, apiKey: this.reasoning.apiKey ? StringConstants.MASK : '' },
      report: { ...this.report, formats: [...this.report.formats] }
    };
  }

  /**
   * 获取配置摘要
   *
   * @public
   * @returns {Record<string, string>} 关键配置参数的字符串形式
   */
  public getSummary(): Record<string, string> {
    return {
      database_host: this.database.host,
      database_port: this.database.port.toString(),
      database_user: this.database.user,
      retry_attempts: this.database.retryAttempts.toString(),
      monitor_level: this.monitoring.level.toString(),
      enabled_checks: this.monitoring.enabledChecks?.join(',') ?? '(level default)',
      table_statistics: this.monitoring.enableTableStatistics.toString(),
      threshold_count: this.monitoring.thresholds.length.toString(),
      reasoning_enabled: this.reasoning.enabled.toString(),
      report_formats: this.report.formats.join(',')
    };
  }

  /**
   * 解析带验证的整数
   *
   * @private
   * @param envValue - 环境变量值
   * @param defaultValue - 默认值
   * @param min - 最小允许值
   * @param max - 最大允许值
   * @param paramName - 参数名称（用于日志）
   * @returns 验证后的整数值
   */
  private parseIntWithValidation(
    envValue: string | undefined,
    defaultValue: number,
    min: number,
    max: number,
    paramName: string
  ): number {
    if (!envValue) return defaultValue;

    const parsed = parseInt(envValue, 10);
    if (isNaN(parsed)) {
      logger.warn(`参数值无效`, 'ConfigurationManager', {
        parameter: paramName,
        value: envValue,
        defaultValue,
        reason: 'invalid_number'
      });
      return defaultValue;
    }

    if (parsed < min || parsed > max) {
      logger.warn(`参数值超出范围`, 'ConfigurationManager', {
        parameter: paramName,
        value: parsed,
        min,
        max,
        defaultValue,
        reason: 'out_of_range'
      });
      return defaultValue;
    }

    return parsed;
  }

  private parseBoolean(envValue: string | undefined): boolean {
    return (envValue || '').trim().toLowerCase() === StringConstants.TRUE_STRING;
  }

  private parseList(envValue: string | undefined): string[] | undefined {
    const items = (envValue || '')
      .split(',')
      .map(item => item.trim().toLowerCase())
      .filter(item => item.length > 0);
    return items.length > 0 ? items : undefined;
  }

  private parseLevel(envValue: string | undefined): InspectionLevel {
    if (!envValue) {
      return InspectionLevel.ADVANCED;
    }
    const level = LEVEL_ALIASES[envValue.trim().toLowerCase()];
    if (level === undefined) {
      logger.warn('巡检深度无效，使用 advanced', 'ConfigurationManager', { value: envValue });
      return InspectionLevel.ADVANCED;
    }
    return level;
  }

  private parseFormats(envValue: string | undefined): ReportFormat[] {
    const requested = this.parseList(envValue ?? StringConstants.DEFAULT_REPORT_FORMATS) ?? [];
    const formats: ReportFormat[] = [];

    for (const item of requested) {
      const format = REPORT_FORMATS.find(candidate => candidate === item || (item === 'xlsx' && candidate === 'excel'));
      if (!format) {
        logger.warn('不支持的报告格式已忽略', 'ConfigurationManager', { format: item });
      } else if (!formats.includes(format)) {
        formats.push(format);
      }
    }

    return formats.length > 0 ? formats : ['json', 'csv'];
  }

  /**
   * 解析阈值配置
   *
   * 支持两种 JSON 形式：完整规则数组（替换默认规则），
   * 或 `{ 规则名: 界限值 }` 对象（只覆盖同名默认规则的界限值）。
   */
  private parseThresholds(envValue: string | undefined): Threshold[] {
    const defaults = [...DEFAULT_THRESHOLDS];
    if (!envValue || envValue.trim() === '') {
      return defaults;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(envValue);
    } catch (error) {
      logger.warn('阈值配置不是合法 JSON，使用默认阈值', 'ConfigurationManager', {
        reason: error instanceof Error ? error.message : String(error)
      });
      return defaults;
    }

    const parsed = ThresholdOverridesSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('阈值配置格式无效，使用默认阈值', 'ConfigurationManager', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
      return defaults;
    }

    if (Array.isArray(parsed.data)) {
      return parsed.data;
    }

    const overrides = parsed.data;
    const known = new Set(defaults.map(threshold => threshold.name));
    for (const name of Object.keys(overrides)) {
      if (!known.has(name)) {
        logger.warn('未知阈值规则已忽略', 'ConfigurationManager', { threshold: name });
      }
    }

    return defaults.map(threshold =>
      overrides[threshold.name] !== undefined
        ? { ...threshold, limit: overrides[threshold.name] }
        : threshold
    );
  }
}
