/**
 * 错误处理相关类型定义
 *
 * @fileoverview 错误分类、严重级别以及巡检流程中使用的错误类
 * @since 1.0.0
 */

/**
 * 错误严重级别
 */
export enum ErrorSeverity {
  INFO = 'info',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
  FATAL = 'fatal'
}

/**
 * 错误分类枚举
 */
export enum ErrorCategory {
  ACCESS_DENIED = 'access_denied',
  OBJECT_NOT_FOUND = 'object_not_found',
  SYNTAX_ERROR = 'syntax_error',
  CONNECTION_ERROR = 'connection_error',
  SECURITY_VIOLATION = 'security_violation',
  VALIDATION_ERROR = 'validation_error',
  TIMEOUT_ERROR = 'timeout_error',
  NETWORK_ERROR = 'network_error',
  DATABASE_UNAVAILABLE = 'database_unavailable',
  CONFIGURATION_ERROR = 'configuration_error',
  QUERY_INTERRUPTED = 'query_interrupted',
  SERVER_GONE_ERROR = 'server_gone_error',
  SERVER_LOST_ERROR = 'server_lost_error',
  SSL_ERROR = 'ssl_error',
  HOST_METRICS_ERROR = 'host_metrics_error',
  EXTERNAL_SERVICE_ERROR = 'external_service_error',
  INVALID_RESPONSE = 'invalid_response',
  REPORT_GENERATION_ERROR = 'report_generation_error',
  UNKNOWN = 'unknown'
}

/**
 * 错误上下文信息
 */
export interface ErrorContext {
  operation: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

const RECOVERABLE_CATEGORIES: readonly ErrorCategory[] = [
  ErrorCategory.TIMEOUT_ERROR,
  ErrorCategory.NETWORK_ERROR,
  ErrorCategory.CONNECTION_ERROR,
  ErrorCategory.SERVER_GONE_ERROR,
  ErrorCategory.SERVER_LOST_ERROR,
  ErrorCategory.OBJECT_NOT_FOUND,
  ErrorCategory.HOST_METRICS_ERROR,
  ErrorCategory.EXTERNAL_SERVICE_ERROR,
  ErrorCategory.INVALID_RESPONSE
];

const RETRYABLE_CATEGORIES: readonly ErrorCategory[] = [
  ErrorCategory.TIMEOUT_ERROR,
  ErrorCategory.NETWORK_ERROR,
  ErrorCategory.CONNECTION_ERROR,
  ErrorCategory.DATABASE_UNAVAILABLE,
  ErrorCategory.SERVER_GONE_ERROR,
  ErrorCategory.SERVER_LOST_ERROR,
  ErrorCategory.SSL_ERROR,
  ErrorCategory.UNKNOWN
];

/**
 * 巡检系统的基础错误类
 *
 * 所有对外抛出的错误都归一为该类型（或其子类），携带分类、严重级别
 * 以及根据分类推导出的可恢复/可重试标记。
 */
export class MonitorError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly originalError?: Error;
  public readonly recoverable: boolean;
  public readonly retryable: boolean;
  public readonly code?: number | string;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    originalError?: Error,
    context?: ErrorContext
  ) {
    super(message);
    this.name = 'MonitorError';
    this.category = category;
    this.severity = severity;
    this.originalError = originalError;
    this.context = context;
    this.timestamp = new Date();

    // 驱动错误的 code 可能是数字（errno）也可能是字符串（ECONNREFUSED）
    if (originalError && 'code' in originalError) {
      const code = originalError.code;
      if (typeof code === 'number' || typeof code === 'string') {
        this.code = code;
      }
    }

    this.recoverable = severity !== ErrorSeverity.FATAL && RECOVERABLE_CATEGORIES.includes(category);
    this.retryable = severity !== ErrorSeverity.FATAL && RETRYABLE_CATEGORIES.includes(category);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      recoverable: this.recoverable,
      retryable: this.retryable,
      context: this.context,
      code: this.code,
      timestamp: this.timestamp,
      originalError: this.originalError?.message
    };
  }
}

/**
 * 连接错误
 *
 * 重试耗尽后抛出，对整次巡检是致命的：没有会话就不产生报告。
 */
export class ConnectionError extends MonitorError {
  /** 实际尝试次数 */
  public readonly attempts: number;

  constructor(message: string, attempts: number, lastCause?: MonitorError) {
    super(
      message,
      lastCause?.category ?? ErrorCategory.CONNECTION_ERROR,
      ErrorSeverity.FATAL,
      lastCause
    );
    this.name = 'ConnectionError';
    this.attempts = attempts;
  }
}

/**
 * 查询错误
 *
 * 单条语句失败，只影响发起它的采集器。
 */
export class QueryError extends MonitorError {
  /** 失败的语句 */
  public readonly statement: string;

  constructor(message: string, category: ErrorCategory, statement: string, originalError?: Error) {
    super(message, category, ErrorSeverity.MEDIUM, originalError);
    this.name = 'QueryError';
    this.statement = statement;
  }
}

/**
 * 外部推理服务错误
 *
 * 调用失败、超时或响应无法解析时抛出，调用方据此回退到本地规则。
 */
export class RecommendationServiceError extends MonitorError {
  constructor(message: string, category: ErrorCategory = ErrorCategory.EXTERNAL_SERVICE_ERROR, originalError?: Error) {
    super(message, category, ErrorSeverity.LOW, originalError);
    this.name = 'RecommendationServiceError';
  }
}
