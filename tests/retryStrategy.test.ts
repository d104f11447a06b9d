/**
 * 智能重试策略测试
 *
 * @description 测试重试逻辑、不可重试错误、延迟计算与重试统计
 * @since 1.0.0
 */

import { SmartRetryStrategy } from '../src/retryStrategy.js';
import { ErrorCategory, ErrorSeverity, MonitorError } from '../src/types.js';

function refused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:3306'), { code: 'ECONNREFUSED' });
}

const FAST = { baseDelay: 0, jitter: false };

describe('SmartRetryStrategy', () => {
  beforeEach(() => {
    SmartRetryStrategy.resetRetryStats();
  });

  describe('executeWithRetry', () => {
    test('第一次成功时不重试', async () => {
      const operation = jest.fn().mockResolvedValue('ok');

      const result = await SmartRetryStrategy.executeWithRetry(operation, FAST);

      expect(operation).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(true);
      expect(result.attempts).toBe(1);
      expect(result.finalResult).toBe('ok');
      expect(result.totalDelay).toBe(0);
    });

    test('可重试错误之后成功', async () => {
      const operation = jest.fn<Promise<string>, []>()
        .mockRejectedValueOnce(refused())
        .mockRejectedValueOnce(refused())
        .mockResolvedValue('ok');

      const result = await SmartRetryStrategy.executeWithRetry(operation, { ...FAST, maxAttempts: 3 });

      expect(result.success).toBe(true);
      expect(result.attempts).toBe(3);
      expect(result.retryHistory).toHaveLength(3);
      expect(result.retryHistory[0].error?.category).toBe(ErrorCategory.CONNECTION_ERROR);
    });

    test('不可重试错误立即失败', async () => {
      const operation = jest.fn().mockRejectedValue({ errno: 1045, message: 'Access denied for user' });

      const result = await SmartRetryStrategy.executeWithRetry(operation, { ...FAST, maxAttempts: 5 });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      expect(result.lastError?.category).toBe(ErrorCategory.ACCESS_DENIED);
    });

    test('致命错误不重试', async () => {
      const operation = jest.fn().mockRejectedValue(
        new MonitorError('fatal', ErrorCategory.CONNECTION_ERROR, ErrorSeverity.FATAL)
      );

      const result = await SmartRetryStrategy.executeWithRetry(operation, { ...FAST, maxAttempts: 3 });

      expect(result.attempts).toBe(1);
    });

    test('重试耗尽后返回失败结果并记录统计', async () => {
      const operation = jest.fn().mockRejectedValue(refused());

      const result = await SmartRetryStrategy.executeWithRetry(
        operation,
        { ...FAST, maxAttempts: 3 },
        { operation: 'test.connect', timestamp: new Date() }
      );

      expect(operation).toHaveBeenCalledTimes(3);
      expect(result.success).toBe(false);
      expect(result.attempts).toBe(3);
      expect(result.finalResult).toBeUndefined();

      const stats = SmartRetryStrategy.getRetryStats('test.connect');
      expect(stats?.failedOperations).toBe(1);
      expect(stats?.totalRetries).toBe(2);
    });

    test('自定义条件可以阻止重试', async () => {
      const operation = jest.fn().mockRejectedValue(refused());
      const condition = jest.fn().mockReturnValue(false);

      const result = await SmartRetryStrategy.executeWithRetry(operation, { ...FAST, maxAttempts: 3, condition });

      expect(result.attempts).toBe(1);
      expect(condition).toHaveBeenCalledTimes(1);
    });
  });

  describe('calculateDelay', () => {
    const strategy = { baseDelay: 100, maxDelay: 1000, backoffMultiplier: 2, jitter: false };

    test('指数退避', () => {
      expect(SmartRetryStrategy.calculateDelay(1, strategy)).toBe(100);
      expect(SmartRetryStrategy.calculateDelay(3, strategy)).toBe(400);
    });

    test('不超过最大延迟', () => {
      expect(SmartRetryStrategy.calculateDelay(5, strategy)).toBe(1000);
    });

    test('抖动范围为正负 10%', () => {
      const delay = SmartRetryStrategy.calculateDelay(2, { ...strategy, jitter: true });

      expect(delay).toBeGreaterThanOrEqual(180);
      expect(delay).toBeLessThanOrEqual(220);
    });
  });
});
