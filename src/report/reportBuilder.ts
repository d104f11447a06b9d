/**
 * 报告构建器
 *
 * 汇总一次巡检的采集、分析与建议结果，组装为只读的 Report。
 * 每个解析出的检查项对应一个章节，采集失败的章节带错误信息并标记为 failed。
 * 构建器只能 build 一次，之后报告被深度冻结。
 *
 * @fileoverview 报告组装
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { StringConstants } from '../constants.js';
import {
  CHECK_TITLES,
  CollectorFailure,
  ConnectionIdentity,
  ErrorCategory,
  ErrorSeverity,
  Finding,
  INSPECTION_LEVEL_NAMES,
  MetricSample,
  MonitorError,
  Recommendation,
  RecommendationSource,
  Report,
  ReportSection,
  ResolvedChecks
} from '../types.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function reportError(message: string): MonitorError {
  return new MonitorError(message, ErrorCategory.REPORT_GENERATION_ERROR, ErrorSeverity.HIGH);
}

/**
 * 报告构建器
 *
 * @class ReportBuilder
 * @since 1.0.0
 *
 * @example
 * const report = new ReportBuilder()
 *   .withConnection(session.identity)
 *   .withChecks(resolved)
 *   .withSamples(analysis.samples, collection.failures)
 *   .withFindings(analysis.findings)
 *   .withRecommendations(outcome.recommendations, outcome.mode, outcome.notice)
 *   .build();
 */
export class ReportBuilder {
  private connection?: ConnectionIdentity;
  private resolved?: ResolvedChecks;
  private samples: readonly MetricSample[] = [];
  private failures: readonly CollectorFailure[] = [];
  private findings: readonly Finding[] = [];
  private recommendations: readonly Recommendation[] = [];
  private recommendationMode: RecommendationSource = 'local';
  private recommendationNotice?: string;
  private built = false;

  constructor(private readonly generatedAt: string = new Date().toISOString()) {}

  public withConnection(identity: ConnectionIdentity): this {
    this.ensureOpen();
    this.connection = { host: identity.host, port: identity.port, user: identity.user };
    return this;
  }

  public withChecks(resolved: ResolvedChecks): this {
    this.ensureOpen();
    this.resolved = resolved;
    return this;
  }

  /**
   * @param samples - 原始样本加派生样本
   * @param failures - 采集失败记录
   */
  public withSamples(samples: readonly MetricSample[], failures: readonly CollectorFailure[] = []): this {
    this.ensureOpen();
    this.samples = [...samples];
    this.failures = [...failures];
    return this;
  }

  public withFindings(findings: readonly Finding[]): this {
    this.ensureOpen();
    this.findings = [...findings];
    return this;
  }

  public withRecommendations(
    recommendations: readonly Recommendation[],
    mode: RecommendationSource = 'local',
    notice?: string
  ): this {
    this.ensureOpen();
    this.recommendations = [...recommendations];
    this.recommendationMode = mode;
    this.recommendationNotice = notice;
    return this;
  }

  /**
   * 组装报告
   *
   * @throws {MonitorError} 缺少连接或检查项，或存在不引用任何发现项的建议
   */
  public build(): Report {
    this.ensureOpen();
    if (!this.connection || !this.resolved) {
      throw reportError('报告缺少连接身份或检查项');
    }
    this.validate();
    this.built = true;

    const sections = this.resolved.checks.map((check): ReportSection => {
      const failure = this.failures.find(entry => entry.collector === check);
      if (failure) {
        return {
          collector: check,
          title: CHECK_TITLES[check],
          status: 'failed',
          samples: [],
          error: { category: failure.category, message: failure.message }
        };
      }
      return {
        collector: check,
        title: CHECK_TITLES[check],
        status: 'ok',
        samples: this.samples.filter(sample => sample.collector === check)
      };
    });

    const report: Report = {
      reportVersion: StringConstants.REPORT_VERSION,
      generatedAt: this.generatedAt,
      connection: this.connection,
      level: this.resolved.level,
      levelName: INSPECTION_LEVEL_NAMES[this.resolved.level],
      checks: {
        resolved: [...this.resolved.checks],
        skipped: this.resolved.skipped.map(entry => ({ ...entry }))
      },
      sections,
      findings: this.findings.map(finding => ({ ...finding })),
      recommendations: this.recommendations.map(recommendation => ({
        ...recommendation,
        findingIds: [...recommendation.findingIds]
      })),
      recommendationMode: this.recommendationMode,
      ...(this.recommendationNotice !== undefined ? { recommendationNotice: this.recommendationNotice } : {}),
      degraded: sections.some(section => section.status === 'failed')
    };

    return deepFreeze(report);
  }

  private validate(): void {
    const findingIds = new Set<string>();
    for (const finding of this.findings) {
      if (findingIds.has(finding.id)) {
        throw reportError(`发现项重复: ${finding.id}`);
      }
      findingIds.add(finding.id);
    }

    for (const recommendation of this.recommendations) {
      if (recommendation.findingIds.length === 0 || !recommendation.findingIds.every(id => findingIds.has(id))) {
        throw reportError(`建议 ${recommendation.id} 引用了不存在的发现项`);
      }
    }
  }

  private ensureOpen(): void {
    if (this.built) {
      throw reportError('报告已生成，不能再修改');
    }
  }
}
