/**
 * 分析引擎
 *
 * 纯函数：(样本, 阈值) -> 发现项。先补充派生指标，再逐条评估阈值。
 * 指标缺失时对应规则不产生发现项；同一指标上多条规则同时触发时只保留最严重的一条。
 * 输出按严重级别降序、指标名升序排列，相同输入总是得到相同输出。
 *
 * @fileoverview 阈值评估与发现项生成
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import {
  Comparator,
  Finding,
  MetricSample,
  SEVERITY_RANK,
  Threshold
} from '../types.js';
import { NumberUtils } from '../utils/common.js';
import { deriveIndicators, numericValue } from './derivedIndicators.js';
import { matchMetric } from './metricPattern.js';

/**
 * 分析结果
 */
export interface AnalysisResult {
  /** 原始样本加派生样本 */
  readonly samples: readonly MetricSample[];
  readonly findings: readonly Finding[];
}

/**
 * 分析引擎
 *
 * @class AnalysisEngine
 * @since 1.0.0
 */
export class AnalysisEngine {
  /**
   * 补充派生指标并评估阈值
   *
   * @example
   * const { samples, findings } = AnalysisEngine.analyze(collected, config.monitoring.thresholds);
   */
  public static analyze(samples: readonly MetricSample[], thresholds: readonly Threshold[]): AnalysisResult {
    const enriched = [...samples, ...deriveIndicators(samples)];
    return {
      samples: enriched,
      findings: this.evaluate(enriched, thresholds)
    };
  }

  /**
   * 评估阈值
   *
   * 只比较数值与时长（按毫秒）样本，字符串样本不参与评估。
   */
  public static evaluate(samples: readonly MetricSample[], thresholds: readonly Threshold[]): Finding[] {
    const strongest = new Map<string, Finding>();

    for (const sample of samples) {
      const value = numericValue(sample.value);
      if (value === undefined || strongest.has(sample.name)) {
        continue;
      }

      let selected: Finding | undefined;
      for (const threshold of thresholds) {
        if (!matchMetric(threshold.metric, sample.name) || !this.compare(value, threshold.comparator, threshold.limit)) {
          continue;
        }
        if (!selected || SEVERITY_RANK[threshold.severity] > SEVERITY_RANK[selected.severity]) {
          selected = this.createFinding(sample, value, threshold);
        }
      }

      if (selected) {
        strongest.set(sample.name, selected);
      }
    }

    return [...strongest.values()].sort(compareFindings);
  }

  public static compare(value: number, comparator: Comparator, limit: number): boolean {
    switch (comparator) {
      case '>':
        return value > limit;
      case '<':
        return value < limit;
      case '>=':
        return value >= limit;
      case '<=':
        return value <= limit;
    }
  }

  private static createFinding(sample: MetricSample, value: number, threshold: Threshold): Finding {
    const label = threshold.description ?? threshold.name;
    return {
      id: `${sample.name}#${threshold.severity}`,
      metric: sample.name,
      severity: threshold.severity,
      value,
      limit: threshold.limit,
      comparator: threshold.comparator,
      threshold: threshold.name,
      collector: sample.collector,
      description: `${label}：当前值 ${formatNumber(value)}，阈值 ${threshold.comparator} ${formatNumber(threshold.limit)}`
    };
  }
}

/**
 * 发现项排序：严重级别降序，指标名升序
 */
export function compareFindings(a: Finding, b: Finding): number {
  const bySeverity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  if (bySeverity !== 0) {
    return bySeverity;
  }
  if (a.metric < b.metric) return -1;
  if (a.metric > b.metric) return 1;
  return 0;
}

function formatNumber(value: number): string {
  return String(NumberUtils.round2(value));
}
