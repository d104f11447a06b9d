/**
 * 通用工具函数
 *
 * 时间、ID、数值转换与超时控制等在各模块间复用的工具函数。
 *
 * @fileoverview 通用工具函数集合
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

/**
 * 时间相关工具函数
 */
export class TimeUtils {
  /**
   * 获取当前时间戳（毫秒）
   */
  static now(): number {
    return Date.now();
  }

  /**
   * 计算持续时间（毫秒）
   */
  static getDurationInMs(startTime: number): number {
    return Date.now() - startTime;
  }

  /**
   * 生成用于文件名的 UTC 时间戳：YYYYMMDD_HHMMSS
   *
   * @example
   * TimeUtils.formatFileTimestamp('2024-03-05T07:08:09.000Z'); // '20240305_070809'
   */
  static formatFileTimestamp(iso: string): string {
    const date = new Date(iso);
    const pad = (value: number): string => value.toString().padStart(2, '0');
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
      `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  }

  /**
   * 解析 MySQL TIME 字符串（HH:MM:SS[.ffffff]）为毫秒
   */
  static parseTimeToMs(value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value * 1000;
    }
    if (typeof value !== 'string') {
      return undefined;
    }
    const match = /^(-)?(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/.exec(value.trim());
    if (!match) {
      return undefined;
    }
    const sign = match[1] ? -1 : 1;
    const total = Number(match[2]) * 3600 + Number(match[3]) * 60 + Number(match[4]);
    return sign * Math.round(total * 1000);
  }
}

/**
 * ID生成工具
 */
export class IdUtils {
  /**
   * 生成短ID（基于时间戳和随机数）
   */
  static generateShortId(): string {
    return Date.now().toString(36) + Math.random().toString(36).slice(2, 8);
  }
}

/**
 * 数值工具
 */
export class NumberUtils {
  /**
   * 把查询结果中的值转换为有限数值
   *
   * mysql2 对 BIGINT/DECIMAL 可能返回字符串，SHOW STATUS 的值总是字符串。
   */
  static toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
  }

  static clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
  }

  /**
   * 保留两位小数，用于展示
   */
  static round2(value: number): number {
    return Math.round(value * 100) / 100;
  }

  /**
   * 格式化字节数为可读字符串
   */
  static formatBytes(bytes: number): string {
    const units = ['B', 'KB', 'MB', 'GB', 'TB'];
    let size = bytes;
    let unitIndex = 0;

    while (Math.abs(size) >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(2)} ${units[unitIndex]}`;
  }
}

/**
 * 为 Promise 设置超时
 *
 * 超时后以 onTimeout() 的返回值拒绝；原 Promise 之后若成功返回，
 * 其结果交给 onLateResult 处理（例如销毁迟到的连接）。
 *
 * @param promise - 原始 Promise
 * @param timeoutMs - 超时时间（毫秒），小于等于 0 表示不设超时
 * @param onTimeout - 生成超时错误
 * @param onLateResult - 迟到结果的处理函数
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  onLateResult?: (result: T) => void
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      reject(onTimeout());
    }, timeoutMs);

    promise.then(
      result => {
        if (settled) {
          onLateResult?.(result);
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      },
      (error: unknown) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
