/**
 * MySQL 错误分类器
 *
 * 根据驱动错误代码（数字 errno 或字符串 code）和消息内容对错误分类，
 * 并给出对应的严重级别。
 *
 * @fileoverview MySQL错误分类
 * @since 1.0.0
 */

import { ErrorCategory, ErrorSeverity, MonitorError } from '../types.js';
import { MySQLErrorCodes, DriverErrorCodes } from '../constants.js';

/**
 * 数字错误代码到类别的映射
 */
const ERRNO_MAPPING: Record<number, ErrorCategory> = {
  [MySQLErrorCodes.ACCESS_DENIED]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.ACCESS_DENIED_FOR_USER]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.TABLE_ACCESS_DENIED]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.SPECIFIC_ACCESS_DENIED]: ErrorCategory.ACCESS_DENIED,
  [MySQLErrorCodes.UNKNOWN_DATABASE]: ErrorCategory.OBJECT_NOT_FOUND,
  [MySQLErrorCodes.TABLE_DOESNT_EXIST]: ErrorCategory.OBJECT_NOT_FOUND,
  [MySQLErrorCodes.UNKNOWN_COLUMN]: ErrorCategory.OBJECT_NOT_FOUND,
  [MySQLErrorCodes.UNKNOWN_SYSTEM_VARIABLE]: ErrorCategory.OBJECT_NOT_FOUND,
  [MySQLErrorCodes.PARSE_ERROR]: ErrorCategory.SYNTAX_ERROR,
  [MySQLErrorCodes.CANT_CONNECT_TO_SERVER]: ErrorCategory.CONNECTION_ERROR,
  [MySQLErrorCodes.UNKNOWN_HOST]: ErrorCategory.NETWORK_ERROR,
  [MySQLErrorCodes.SERVER_HAS_GONE_AWAY]: ErrorCategory.SERVER_GONE_ERROR,
  [MySQLErrorCodes.LOST_CONNECTION]: ErrorCategory.SERVER_LOST_ERROR,
  [MySQLErrorCodes.TOO_MANY_CONNECTIONS]: ErrorCategory.DATABASE_UNAVAILABLE,
  [MySQLErrorCodes.QUERY_INTERRUPTED]: ErrorCategory.QUERY_INTERRUPTED,
  [MySQLErrorCodes.QUERY_TIMEOUT]: ErrorCategory.TIMEOUT_ERROR,
  [MySQLErrorCodes.SSL_ERROR]: ErrorCategory.SSL_ERROR,
};

/**
 * 字符串错误代码到类别的映射
 */
const CODE_MAPPING: Record<string, ErrorCategory> = {
  [DriverErrorCodes.ECONNREFUSED]: ErrorCategory.CONNECTION_ERROR,
  [DriverErrorCodes.ECONNRESET]: ErrorCategory.NETWORK_ERROR,
  [DriverErrorCodes.ETIMEDOUT]: ErrorCategory.TIMEOUT_ERROR,
  [DriverErrorCodes.ENOTFOUND]: ErrorCategory.NETWORK_ERROR,
  [DriverErrorCodes.EHOSTUNREACH]: ErrorCategory.NETWORK_ERROR,
  [DriverErrorCodes.PROTOCOL_CONNECTION_LOST]: ErrorCategory.SERVER_LOST_ERROR,
  [DriverErrorCodes.PROTOCOL_SEQUENCE_TIMEOUT]: ErrorCategory.TIMEOUT_ERROR,
  [DriverErrorCodes.ER_ACCESS_DENIED_ERROR]: ErrorCategory.ACCESS_DENIED,
};

/**
 * 错误类别对应的严重级别
 */
const SEVERITY_MAPPING: Partial<Record<ErrorCategory, ErrorSeverity>> = {
  [ErrorCategory.ACCESS_DENIED]: ErrorSeverity.HIGH,
  [ErrorCategory.CONNECTION_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.NETWORK_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.DATABASE_UNAVAILABLE]: ErrorSeverity.HIGH,
  [ErrorCategory.SERVER_GONE_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.SERVER_LOST_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.SSL_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.SECURITY_VIOLATION]: ErrorSeverity.HIGH,
  [ErrorCategory.CONFIGURATION_ERROR]: ErrorSeverity.HIGH,
  [ErrorCategory.TIMEOUT_ERROR]: ErrorSeverity.MEDIUM,
  [ErrorCategory.QUERY_INTERRUPTED]: ErrorSeverity.MEDIUM,
  [ErrorCategory.OBJECT_NOT_FOUND]: ErrorSeverity.LOW,
  [ErrorCategory.SYNTAX_ERROR]: ErrorSeverity.LOW,
  [ErrorCategory.HOST_METRICS_ERROR]: ErrorSeverity.LOW,
  [ErrorCategory.EXTERNAL_SERVICE_ERROR]: ErrorSeverity.LOW,
  [ErrorCategory.INVALID_RESPONSE]: ErrorSeverity.LOW,
};

/**
 * 错误类别的消息前缀
 */
const CATEGORY_PREFIX: Partial<Record<ErrorCategory, string>> = {
  [ErrorCategory.ACCESS_DENIED]: '[访问被拒绝]',
  [ErrorCategory.OBJECT_NOT_FOUND]: '[对象不存在]',
  [ErrorCategory.SYNTAX_ERROR]: '[语法错误]',
  [ErrorCategory.CONNECTION_ERROR]: '[连接错误]',
  [ErrorCategory.NETWORK_ERROR]: '[网络错误]',
  [ErrorCategory.TIMEOUT_ERROR]: '[超时]',
  [ErrorCategory.SERVER_GONE_ERROR]: '[服务器已断开]',
  [ErrorCategory.SERVER_LOST_ERROR]: '[连接丢失]',
  [ErrorCategory.DATABASE_UNAVAILABLE]: '[数据库不可用]',
  [ErrorCategory.SSL_ERROR]: '[SSL错误]',
};

/**
 * MySQL 错误分类器
 *
 * @class MySQLErrorClassifier
 * @since 1.0.0
 */
export class MySQLErrorClassifier {
  /**
   * 分类错误
   *
   * 已经是 MonitorError 的错误原样返回。
   *
   * @public
   * @static
   * @param {unknown} error - 原始错误对象
   * @param {string} [context] - 错误发生的上下文信息
   * @returns {MonitorError} 分类后的结构化错误
   */
  public static classifyError(error: unknown, context?: string): MonitorError {
    if (error instanceof MonitorError) {
      return error;
    }

    const message = this.extractErrorMessage(error);
    const category = this.categorize(error, message);
    const severity = SEVERITY_MAPPING[category] ?? ErrorSeverity.MEDIUM;

    return new MonitorError(
      this.buildEnhancedMessage(message, category, context),
      category,
      severity,
      error instanceof Error ? error : undefined
    );
  }

  /**
   * 仅返回错误类别
   */
  public static categorize(error: unknown, message: string = this.extractErrorMessage(error)): ErrorCategory {
    if (error instanceof MonitorError) {
      return error.category;
    }

    const errno = this.extractErrno(error);
    if (errno !== undefined && ERRNO_MAPPING[errno]) {
      return ERRNO_MAPPING[errno];
    }

    const code = this.extractCode(error);
    if (code !== undefined && CODE_MAPPING[code]) {
      return CODE_MAPPING[code];
    }

    return this.categorizeByMessage(message);
  }

  private static categorizeByMessage(message: string): ErrorCategory {
    const lowerMessage = message.toLowerCase();

    if (lowerMessage.includes('access denied') || lowerMessage.includes('permission')) {
      return ErrorCategory.ACCESS_DENIED;
    }
    if (lowerMessage.includes("doesn't exist") || lowerMessage.includes('unknown system variable')) {
      return ErrorCategory.OBJECT_NOT_FOUND;
    }
    if (lowerMessage.includes('syntax')) {
      return ErrorCategory.SYNTAX_ERROR;
    }
    if (lowerMessage.includes('server has gone away')) {
      return ErrorCategory.SERVER_GONE_ERROR;
    }
    if (lowerMessage.includes('lost connection')) {
      return ErrorCategory.SERVER_LOST_ERROR;
    }
    if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
      return ErrorCategory.TIMEOUT_ERROR;
    }
    if (lowerMessage.includes('connect') || lowerMessage.includes('connection')) {
      return ErrorCategory.CONNECTION_ERROR;
    }
    if (lowerMessage.includes('network') || lowerMessage.includes('socket')) {
      return ErrorCategory.NETWORK_ERROR;
    }
    if (lowerMessage.includes('ssl')) {
      return ErrorCategory.SSL_ERROR;
    }

    return ErrorCategory.UNKNOWN;
  }

  private static extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    if (typeof error === 'object' && error !== null && 'message' in error) {
      return String(error.message);
    }
    return '未知错误';
  }

  private static extractErrno(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null) {
      if ('errno' in error && typeof error.errno === 'number') {
        return error.errno;
      }
      if ('code' in error && typeof error.code === 'number') {
        return error.code;
      }
    }
    return undefined;
  }

  private static extractCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
      return error.code;
    }
    return undefined;
  }

  private static buildEnhancedMessage(
    originalMessage: string,
    category: ErrorCategory,
    context?: string
  ): string {
    const prefix = CATEGORY_PREFIX[category];
    const contextSuffix = context ? ` (上下文: ${context})` : '';
    return `${prefix ? prefix + ' ' : ''}${originalMessage}${contextSuffix}`;
  }
}
