/**
 * 巡检领域类型定义
 *
 * 指标样本、阈值、发现项、建议与报告等在整条巡检流水线中流转的值类型。
 * 这些值一经产生即不可变，因此所有字段均为只读。
 *
 * @fileoverview 巡检领域类型
 * @since 1.0.0
 */

import type { ErrorCategory } from './errorTypes.js';

/**
 * 巡检深度
 */
export enum InspectionLevel {
  BASIC = 1,
  ADVANCED = 2,
  EXPERT = 3
}

/**
 * 巡检深度名称
 */
export const INSPECTION_LEVEL_NAMES: Record<InspectionLevel, string> = {
  [InspectionLevel.BASIC]: 'basic',
  [InspectionLevel.ADVANCED]: 'advanced',
  [InspectionLevel.EXPERT]: 'expert'
};

/**
 * 已知检查项，顺序即采集顺序
 */
export const CHECK_NAMES = [
  'system_resources',
  'connection_stats',
  'innodb',
  'query_cache',
  'slow_queries',
  'performance_schema',
  'table_statistics'
] as const;

export type CheckName = typeof CHECK_NAMES[number];

/**
 * 检查项在报告中的章节标题
 */
export const CHECK_TITLES: Record<CheckName, string> = {
  system_resources: '主机资源',
  connection_stats: '连接状态',
  innodb: 'InnoDB 存储引擎',
  query_cache: '查询缓存',
  slow_queries: '慢查询',
  performance_schema: 'Performance Schema',
  table_statistics: '表统计'
};

export function isCheckName(value: string): value is CheckName {
  return CHECK_NAMES.some(name => name === value);
}

/**
 * 时长值
 */
export interface Duration {
  readonly milliseconds: number;
}

export type MetricValue = number | string | Duration;

/**
 * 指标样本
 */
export interface MetricSample {
  /** 点分指标名，例如 innodb.buffer_pool.hit_ratio */
  readonly name: string;
  readonly value: MetricValue;
  /** 产生该样本的采集器 */
  readonly collector: CheckName;
  /** 采集时间（ISO 8601） */
  readonly capturedAt: string;
  /** 是否由分析引擎从原始计数推导 */
  readonly derived?: boolean;
}

export type Comparator = '>' | '<' | '>=' | '<=';

/**
 * 发现项严重级别
 */
export enum FindingSeverity {
  INFO = 'info',
  WARNING = 'warning',
  CRITICAL = 'critical'
}

/**
 * 严重级别权重，用于排序
 */
export const SEVERITY_RANK: Record<FindingSeverity, number> = {
  [FindingSeverity.INFO]: 1,
  [FindingSeverity.WARNING]: 2,
  [FindingSeverity.CRITICAL]: 3
};

/**
 * 阈值规则
 */
export interface Threshold {
  /** 规则名，例如 connection_usage */
  readonly name: string;
  /** 指标名，可用 `*` 匹配单个点分段 */
  readonly metric: string;
  readonly comparator: Comparator;
  readonly limit: number;
  readonly severity: FindingSeverity;
  readonly description?: string;
}

/**
 * 发现项：一条阈值对一个指标样本的违规
 */
export interface Finding {
  /** 在一次巡检内唯一：`${metric}#${severity}` */
  readonly id: string;
  readonly metric: string;
  readonly severity: FindingSeverity;
  readonly value: number;
  readonly limit: number;
  readonly comparator: Comparator;
  /** 触发的阈值规则名 */
  readonly threshold: string;
  readonly collector: CheckName;
  readonly description: string;
}

export type ApprovalState = 'pending' | 'approved' | 'rejected' | 'not-applicable';

export type ApprovalDecision = 'approved' | 'rejected';

export type RecommendationPriority = 'high' | 'medium' | 'low';

export type RecommendationSource = 'local' | 'enriched';

/**
 * 优化建议
 */
export interface Recommendation {
  readonly id: string;
  /** 引用的发现项，至少一个 */
  readonly findingIds: readonly string[];
  readonly subsystem: string;
  readonly advice: string;
  /** 建议执行的语句，只提出不执行 */
  readonly command?: string;
  readonly priority: RecommendationPriority;
  readonly source: RecommendationSource;
  readonly approval: ApprovalState;
}

/**
 * 连接身份，不包含密码
 */
export interface ConnectionIdentity {
  readonly host: string;
  readonly port: number;
  readonly user: string;
}

export interface SkippedCheck {
  readonly check: string;
  readonly reason: string;
}

/**
 * 等级策略的解析结果，一次巡检只计算一次
 */
export interface ResolvedChecks {
  readonly level: InspectionLevel;
  readonly checks: readonly CheckName[];
  readonly skipped: readonly SkippedCheck[];
}

/**
 * 采集器失败记录
 */
export interface CollectorFailure {
  readonly collector: CheckName;
  readonly category: ErrorCategory;
  readonly message: string;
}

export type SectionStatus = 'ok' | 'failed';

/**
 * 报告输出格式
 */
export const REPORT_FORMATS = ['text', 'json', 'csv', 'excel'] as const;

export type ReportFormat = typeof REPORT_FORMATS[number];

/**
 * 报告中按采集器分组的章节
 */
export interface ReportSection {
  readonly collector: CheckName;
  readonly title: string;
  readonly status: SectionStatus;
  readonly samples: readonly MetricSample[];
  readonly error?: {
    readonly category: ErrorCategory;
    readonly message: string;
  };
}

/**
 * 一次巡检的完整报告
 */
export interface Report {
  readonly reportVersion: string;
  readonly generatedAt: string;
  readonly connection: ConnectionIdentity;
  readonly level: InspectionLevel;
  readonly levelName: string;
  readonly checks: {
    readonly resolved: readonly CheckName[];
    readonly skipped: readonly SkippedCheck[];
  };
  readonly sections: readonly ReportSection[];
  readonly findings: readonly Finding[];
  readonly recommendations: readonly Recommendation[];
  readonly recommendationMode: RecommendationSource;
  /** 回退到本地规则时的原因 */
  readonly recommendationNotice?: string;
  /** 是否有章节采集失败 */
  readonly degraded: boolean;
}
