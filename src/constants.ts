/**
 * 巡检系统常量 - 中央配置管理
 *
 * 集中定义 MySQL 错误代码、默认配置值与字符串常量（环境变量键、消息模板等）。
 * 所有默认值均可通过环境变量覆盖。
 *
 * @fileoverview 巡检系统常量
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */
export const MySQLErrorCodes = {
  /** 访问控制错误 - 身份验证和授权失败 */
  ACCESS_DENIED: 1045,                    // 一般访问拒绝
  ACCESS_DENIED_FOR_USER: 1044,           // 用户特定访问拒绝
  TABLE_ACCESS_DENIED: 1142,              // 表级访问拒绝
  SPECIFIC_ACCESS_DENIED: 1227,           // 缺少 PROCESS 等全局权限

  /** 对象解析错误 - 数据库对象未找到 */
  UNKNOWN_DATABASE: 1049,                 // 数据库不存在
  TABLE_DOESNT_EXIST: 1146,               // 表不存在（如 mysql.slow_log）
  UNKNOWN_COLUMN: 1054,                   // 列不存在
  UNKNOWN_SYSTEM_VARIABLE: 1193,          // 变量不存在（如 8.0 上的 query_cache）

  /** SQL 语法错误 */
  PARSE_ERROR: 1064,                      // SQL 语法错误

  /** 连接错误 - 网络和连接问题 */
  CANT_CONNECT_TO_SERVER: 2003,           // 无法连接到 MySQL 服务器
  UNKNOWN_HOST: 2005,                     // 主机名无法解析
  SERVER_HAS_GONE_AWAY: 2006,             // MySQL 服务器已断开
  LOST_CONNECTION: 2013,                  // 查询期间连接丢失
  TOO_MANY_CONNECTIONS: 1040,             // 连接数已满

  /** 查询中断 */
  QUERY_INTERRUPTED: 1317,                // 查询被中断
  QUERY_TIMEOUT: 3024,                    // 超过 max_execution_time

  /** SSL 错误 */
  SSL_ERROR: 2026,                        // SSL 连接错误
} as const;

/**
 * 驱动层字符串错误代码
 */
export const DriverErrorCodes = {
  ECONNREFUSED: 'ECONNREFUSED',
  ECONNRESET: 'ECONNRESET',
  ETIMEDOUT: 'ETIMEDOUT',
  ENOTFOUND: 'ENOTFOUND',
  EHOSTUNREACH: 'EHOSTUNREACH',
  PROTOCOL_CONNECTION_LOST: 'PROTOCOL_CONNECTION_LOST',
  PROTOCOL_SEQUENCE_TIMEOUT: 'PROTOCOL_SEQUENCE_TIMEOUT',
  ER_ACCESS_DENIED_ERROR: 'ER_ACCESS_DENIED_ERROR',
} as const;

/**
 * 默认配置常量
 *
 * @constant
 * @since 1.0.0
 *
 * @example
 * const port = process.env.MYSQL_PORT || DefaultConfig.MYSQL_PORT;
 */
export const DefaultConfig = {
  /** MySQL 连接配置 */
  MYSQL_PORT: 3306,                        // 标准 MySQL 端口
  CONNECT_TIMEOUT: 10,                     // 单次连接超时（秒）
  QUERY_TIMEOUT: 30,                       // 单条语句超时（秒）
  RETRY_ATTEMPTS: 3,                       // 连接尝试次数（含首次）
  RETRY_DELAY: 1000,                       // 重试基础延迟（毫秒）
  RETRY_MAX_DELAY: 10000,                  // 重试最大延迟（毫秒）

  /** 巡检配置 */
  MAX_TABLES: 500,                         // 表统计的最大表数
  HIGH_LATENCY_MS: 1000,                   // 高延迟语句阈值（毫秒）
  LONG_RUNNING_SECONDS: 60,                // 长时间运行语句阈值（秒）
  SLOW_LOG_SAMPLE_SIZE: 10,                // 读取最近慢查询条数
  STATEMENT_DIGEST_LIMIT: 10,              // 语句摘要 Top N

  /** 外部推理服务配置 */
  REASONING_MAX_TOKENS: 4096,
  REASONING_TEMPERATURE: 0.7,
  REASONING_TIMEOUT: 30000,                // 毫秒
  REASONING_MAX_REQUEST_BYTES: 32768,
  REASONING_MAX_FINDINGS: 50,
  REASONING_MAX_SAMPLES: 200,

  /** 日志配置 */
  MAX_LOG_DETAIL_LENGTH: 100,              // 最大日志详细信息长度
} as const;

/**
 * 字符串常量
 *
 * @constant
 * @since 1.0.0
 *
 * @example
 * const host = process.env[StringConstants.ENV_MYSQL_HOST] || StringConstants.DEFAULT_HOST;
 */
export const StringConstants = {
  /** 数据库配置字符串 */
  DEFAULT_HOST: "localhost",
  DEFAULT_USER: "root",
  DEFAULT_PASSWORD: "",
  CHARSET: "utf8mb4",

  /** 环境变量键 - 数据库 */
  ENV_MYSQL_HOST: "MYSQL_HOST",
  ENV_MYSQL_PORT: "MYSQL_PORT",
  ENV_MYSQL_USER: "MYSQL_USER",
  ENV_MYSQL_PASSWORD: "MYSQL_PASSWORD",
  ENV_MYSQL_SSL: "MYSQL_SSL",
  ENV_CONNECT_TIMEOUT: "MYSQL_CONNECT_TIMEOUT",
  ENV_QUERY_TIMEOUT: "MYSQL_QUERY_TIMEOUT",
  ENV_RETRY_ATTEMPTS: "MYSQL_RETRY_ATTEMPTS",
  ENV_RETRY_DELAY: "MYSQL_RETRY_DELAY",

  /** 环境变量键 - 巡检 */
  ENV_MONITOR_LEVEL: "MONITOR_LEVEL",
  ENV_ENABLED_CHECKS: "MONITOR_ENABLED_CHECKS",
  ENV_ENABLE_TABLES: "MONITOR_ENABLE_TABLES",
  ENV_THRESHOLDS: "MONITOR_THRESHOLDS",
  ENV_DISK_PATH: "MONITOR_DISK_PATH",
  ENV_MAX_TABLES: "MONITOR_MAX_TABLES",
  ENV_HIGH_LATENCY_MS: "MONITOR_HIGH_LATENCY_MS",

  /** 环境变量键 - 推理服务 */
  ENV_REASONING_API_KEY: "ANTHROPIC_API_KEY",
  ENV_REASONING_MODEL: "REASONING_MODEL",
  ENV_REASONING_MAX_TOKENS: "REASONING_MAX_TOKENS",
  ENV_REASONING_TEMPERATURE: "REASONING_TEMPERATURE",
  ENV_REASONING_TIMEOUT: "REASONING_TIMEOUT",
  ENV_REASONING_BASE_URL: "REASONING_BASE_URL",
  ENV_REASONING_MAX_REQUEST_BYTES: "REASONING_MAX_REQUEST_BYTES",

  /** 环境变量键 - 报告与日志 */
  ENV_REPORT_OUTPUT_DIR: "REPORT_OUTPUT_DIR",
  ENV_REPORT_FORMATS: "REPORT_FORMATS",
  ENV_REPORT_FILE_PREFIX: "REPORT_FILE_PREFIX",
  ENV_INTERACTIVE_APPROVAL: "REPORT_INTERACTIVE_APPROVAL",
  ENV_LOG_LEVEL: "LOG_LEVEL",
  ENV_LOG_FORMAT: "LOG_FORMAT",
  ENV_LOG_FILE: "LOG_FILE",

  /** 默认值 */
  DEFAULT_DISK_PATH: "/",
  DEFAULT_REASONING_MODEL: "claude-3-5-sonnet-latest",
  DEFAULT_REASONING_BASE_URL: "https://api.anthropic.com",
  REASONING_API_VERSION: "2023-06-01",
  DEFAULT_OUTPUT_DIR: "exports",
  DEFAULT_REPORT_FORMATS: "json,csv",
  DEFAULT_FILE_PREFIX: "health_report",
  REPORT_VERSION: "1.0",

  /** 特殊值 */
  TRUE_STRING: "true",
  MASK: "***",

  /** 消息模板 */
  MSG_CONNECTION_FAILED: "数据库连接失败",
  MSG_CONNECTION_RETRY_EXHAUSTED: "连接重试已耗尽",
  MSG_CONNECT_TIMEOUT: "连接超时",
  MSG_QUERY_FAILED: "查询失败",
  MSG_SESSION_CLOSED: "会话已关闭",
  MSG_STATEMENT_NOT_READ_ONLY: "仅允许只读语句",
  MSG_COLLECTOR_FAILED: "采集失败",
  MSG_REASONING_FAILED: "外部推理服务调用失败，已回退到本地规则",
  MSG_REASONING_TIMEOUT: "外部推理服务超时",
  MSG_REASONING_INVALID_RESPONSE: "外部推理服务响应格式无效",
} as const;
