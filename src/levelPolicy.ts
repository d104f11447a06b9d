/**
 * 巡检等级策略
 *
 * 把巡检深度与显式启用的检查项解析为本次要运行的采集器列表。
 * 三个等级单调递增：Basic ⊂ Advanced ⊂ Expert。显式列表非空时替换等级默认集合；
 * 表统计需要双重确认：等级为 Expert 且启用标志打开，两者缺一即跳过并记录原因。
 * 解析结果每次巡检只计算一次，返回后不可修改。
 *
 * @fileoverview 等级到检查项的解析
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { CollectorRegistry } from './collectors/collectorRegistry.js';
import {
  CHECK_NAMES,
  CheckName,
  InspectionLevel,
  isCheckName,
  ResolvedChecks,
  SkippedCheck
} from './types.js';

/**
 * 各等级的默认检查项（不含表统计）
 */
export const LEVEL_DEFAULT_CHECKS: Record<InspectionLevel, readonly CheckName[]> = {
  [InspectionLevel.BASIC]: ['system_resources', 'connection_stats'],
  [InspectionLevel.ADVANCED]: ['system_resources', 'connection_stats', 'innodb', 'query_cache', 'slow_queries'],
  [InspectionLevel.EXPERT]: [
    'system_resources',
    'connection_stats',
    'innodb',
    'query_cache',
    'slow_queries',
    'performance_schema'
  ]
};

/**
 * 检查项的旧名称
 */
export const CHECK_ALIASES: Record<string, readonly CheckName[]> = {
  resources: ['system_resources'],
  connections: ['connection_stats'],
  queries: ['query_cache', 'slow_queries'],
  performance: ['performance_schema']
};

/** 认识但不提供采集器的检查项 */
const UNSUPPORTED_CHECKS: Record<string, string> = {
  replication: '不支持复制状态检查'
};

/**
 * 等级策略的输入
 */
export interface LevelPolicyInput {
  level: InspectionLevel;
  enabledChecks?: readonly string[];
  enableTableStatistics: boolean;
}

/**
 * 等级策略
 *
 * @class LevelPolicy
 * @since 1.0.0
 *
 * @example
 * const resolved = LevelPolicy.resolve({
 *   level: InspectionLevel.EXPERT,
 *   enableTableStatistics: true
 * });
 * // resolved.checks 包含 table_statistics
 */
export class LevelPolicy {
  public static resolve(
    input: LevelPolicyInput,
    registry: CollectorRegistry = new CollectorRegistry()
  ): ResolvedChecks {
    const requested = new Set<CheckName>();
    const skipped: SkippedCheck[] = [];
    const skip = (check: string, reason: string): void => {
      if (!skipped.some(entry => entry.check === check)) {
        skipped.push({ check, reason });
      }
    };

    const overrides = (input.enabledChecks ?? []).map(name => name.trim().toLowerCase()).filter(Boolean);

    if (overrides.length > 0) {
      for (const name of overrides) {
        const expanded = isCheckName(name) ? [name] : CHECK_ALIASES[name];
        if (expanded) {
          expanded.forEach(check => requested.add(check));
        } else {
          skip(name, UNSUPPORTED_CHECKS[name] ?? '未知检查项');
        }
      }
    } else {
      LEVEL_DEFAULT_CHECKS[input.level].forEach(check => requested.add(check));
    }

    // 表统计：Expert 且显式启用才运行
    const tablesAllowed = input.level === InspectionLevel.EXPERT && input.enableTableStatistics;
    if (tablesAllowed) {
      requested.add('table_statistics');
    } else if (requested.has('table_statistics') || input.enableTableStatistics) {
      requested.delete('table_statistics');
      skip(
        'table_statistics',
        input.level !== InspectionLevel.EXPERT ? '表统计需要 Expert 等级' : '表统计需要显式启用'
      );
    }

    for (const check of requested) {
      if (!registry.has(check)) {
        requested.delete(check);
        skip(check, '未登记采集器');
      }
    }

    return Object.freeze({
      level: input.level,
      checks: Object.freeze(CHECK_NAMES.filter(check => requested.has(check))),
      skipped: Object.freeze(skipped.map(entry => Object.freeze({ ...entry })))
    });
  }
}
