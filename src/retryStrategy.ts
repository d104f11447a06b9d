/**
 * 智能重试策略
 *
 * 基于错误分类的重试机制，支持指数退避、抖动和自定义重试条件，
 * 供连接器在建立会话时使用。
 *
 * @fileoverview 智能重试策略
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { ErrorCategory, MonitorError, ErrorSeverity, ErrorContext } from './types.js';
import { ErrorHandler } from './errorHandler.js';
import { logger } from './logger.js';

/**
 * 重试策略配置
 */
export interface RetryStrategy {
  /** 最大尝试次数（包括首次尝试） */
  maxAttempts: number;
  /** 基础延迟时间（毫秒） */
  baseDelay: number;
  /** 最大延迟时间（毫秒） */
  maxDelay: number;
  /** 退避乘数 */
  backoffMultiplier: number;
  /** 是否启用抖动 */
  jitter: boolean;
  /** 可重试的错误类别 */
  retryableErrors: ErrorCategory[];
  /** 不可重试的错误类别，优先于 retryableErrors */
  nonRetryableErrors: ErrorCategory[];
  /** 自定义重试条件 */
  condition?: (error: MonitorError, attempt: number) => boolean;
}

/**
 * 单次尝试记录
 */
export interface RetryAttempt {
  /** 尝试序号，从 1 开始 */
  attempt: number;
  /** 该次尝试的错误 */
  error?: MonitorError;
  /** 该次失败后等待的延迟（毫秒） */
  delay: number;
  /** 该次尝试结束的时间戳 */
  timestamp: number;
}

/**
 * 重试结果
 */
export interface RetryResult<T> {
  success: boolean;
  attempts: number;
  totalDelay: number;
  finalResult?: T;
  lastError?: MonitorError;
  retryHistory: RetryAttempt[];
}

/**
 * 单个操作的重试统计
 */
export interface RetryStats {
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  totalRetries: number;
  lastRunAt?: Date;
}

/**
 * 智能重试策略管理器
 *
 * @class SmartRetryStrategy
 * @since 1.0.0
 */
export class SmartRetryStrategy {
  /**
   * 默认重试策略配置
   */
  private static readonly DEFAULT_STRATEGY: RetryStrategy = {
    maxAttempts: 3,
    baseDelay: 1000,
    maxDelay: 10000,
    backoffMultiplier: 2,
    jitter: true,
    retryableErrors: [
      ErrorCategory.CONNECTION_ERROR,
      ErrorCategory.TIMEOUT_ERROR,
      ErrorCategory.NETWORK_ERROR,
      ErrorCategory.DATABASE_UNAVAILABLE,
      ErrorCategory.SERVER_GONE_ERROR,
      ErrorCategory.SERVER_LOST_ERROR,
      ErrorCategory.SSL_ERROR,
      ErrorCategory.UNKNOWN
    ],
    nonRetryableErrors: [
      ErrorCategory.ACCESS_DENIED,
      ErrorCategory.SECURITY_VIOLATION,
      ErrorCategory.SYNTAX_ERROR,
      ErrorCategory.OBJECT_NOT_FOUND,
      ErrorCategory.CONFIGURATION_ERROR,
      ErrorCategory.VALIDATION_ERROR
    ]
  };

  private static retryStats: Map<string, RetryStats> = new Map();

  /**
   * 执行带重试的操作
   *
   * 每次尝试都会重新调用 operation，不复用上一次的中间状态。
   *
   * @public
   * @static
   * @template T
   * @param {() => Promise<T>} operation - 要执行的操作
   * @param {Partial<RetryStrategy>} [customStrategy] - 自定义重试策略
   * @param {ErrorContext} [context] - 错误上下文
   * @returns {Promise<RetryResult<T>>} 重试结果，不会抛出
   */
  public static async executeWithRetry<T>(
    operation: () => Promise<T>,
    customStrategy?: Partial<RetryStrategy>,
    context?: ErrorContext
  ): Promise<RetryResult<T>> {
    const strategy = this.mergeStrategy(customStrategy);
    const operationId = context?.operation || 'anonymous';
    const maxAttempts = Math.max(1, Math.floor(strategy.maxAttempts));
    const retryHistory: RetryAttempt[] = [];
    let attempts = 0;
    let totalDelay = 0;
    let lastError: MonitorError | undefined;

    while (attempts < maxAttempts) {
      attempts++;

      try {
        const result = await operation();
        retryHistory.push({ attempt: attempts, delay: 0, timestamp: Date.now() });
        this.updateRetryStats(operationId, true, attempts);

        return {
          success: true,
          attempts,
          totalDelay,
          finalResult: result,
          retryHistory
        };
      } catch (error) {
        const classifiedError = ErrorHandler.safeError(error, operationId);
        lastError = classifiedError;

        const record: RetryAttempt = {
          attempt: attempts,
          error: classifiedError,
          delay: 0,
          timestamp: Date.now()
        };
        retryHistory.push(record);

        if (!this.shouldRetry(classifiedError, attempts, { ...strategy, maxAttempts })) {
          break;
        }

        const delay = this.calculateDelay(attempts, strategy);
        record.delay = delay;
        totalDelay += delay;

        this.logRetryAttempt(operationId, attempts, classifiedError, delay);
        await this.sleep(delay);
      }
    }

    this.updateRetryStats(operationId, false, attempts);

    return {
      success: false,
      attempts,
      lastError,
      totalDelay,
      retryHistory
    };
  }

  /**
   * 获取重试统计信息
   */
  public static getRetryStats(operationId: string): RetryStats | undefined {
    const stats = this.retryStats.get(operationId);
    return stats ? { ...stats } : undefined;
  }

  /**
   * 重置重试统计
   */
  public static resetRetryStats(operationId?: string): void {
    if (operationId) {
      this.retryStats.delete(operationId);
    } else {
      this.retryStats.clear();
    }
  }

  private static mergeStrategy(customStrategy?: Partial<RetryStrategy>): RetryStrategy {
    return {
      ...this.DEFAULT_STRATEGY,
      ...customStrategy
    };
  }

  /**
   * 判断是否应该重试
   */
  private static shouldRetry(
    error: MonitorError,
    attempt: number,
    strategy: RetryStrategy
  ): boolean {
    if (attempt >= strategy.maxAttempts) {
      return false;
    }

    if (error.severity === ErrorSeverity.FATAL) {
      return false;
    }

    if (strategy.nonRetryableErrors.includes(error.category)) {
      return false;
    }

    if (strategy.retryableErrors.includes(error.category)) {
      return strategy.condition ? strategy.condition(error, attempt) : true;
    }

    return false;
  }

  /**
   * 计算重试延迟（指数退避，可选 10% 抖动）
   */
  public static calculateDelay(attempt: number, strategy: Pick<RetryStrategy, 'baseDelay' | 'maxDelay' | 'backoffMultiplier' | 'jitter'>): number {
    const exponentialDelay = strategy.baseDelay * Math.pow(strategy.backoffMultiplier, attempt - 1);
    const delay = Math.min(exponentialDelay, strategy.maxDelay);

    if (strategy.jitter) {
      const jitterAmount = delay * 0.1;
      return Math.max(0, Math.round(delay + (Math.random() * 2 - 1) * jitterAmount));
    }

    return Math.max(delay, 0);
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private static updateRetryStats(operationId: string, success: boolean, attempts: number): void {
    const stats = this.retryStats.get(operationId) ?? {
      totalOperations: 0,
      successfulOperations: 0,
      failedOperations: 0,
      totalRetries: 0
    };

    stats.totalOperations++;
    if (success) {
      stats.successfulOperations++;
    } else {
      stats.failedOperations++;
    }
    stats.totalRetries += attempts - 1;
    stats.lastRunAt = new Date();

    this.retryStats.set(operationId, stats);
  }

  private static logRetryAttempt(
    operationId: string,
    attempt: number,
    error: MonitorError,
    delay: number
  ): void {
    logger.warn(`重试尝试 [${operationId}] - 第${attempt}次尝试失败，等待${delay}ms`, 'SmartRetryStrategy', {
      operation: operationId,
      category: error.category,
      severity: error.severity,
      reason: error.message,
      attempt,
      delay
    });
  }
}
