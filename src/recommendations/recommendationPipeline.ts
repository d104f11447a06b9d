/**
 * 建议流水线
 *
 * 本地模式直接查规则表；配置了推理服务时先请求增强建议，
 * 失败、超时或响应无效都回退到本地模式并记录警告，不会让巡检失败。
 * 带修正语句的建议一律以 pending 状态产生，流水线自身从不批准或执行语句。
 *
 * @fileoverview 建议生成与回退
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { DefaultConfig, StringConstants } from '../constants.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import {
  ErrorCategory,
  Finding,
  INSPECTION_LEVEL_NAMES,
  InspectionLevel,
  MetricSample,
  Recommendation,
  RecommendationServiceError,
  RecommendationSource
} from '../types.js';
import { withTimeout } from '../utils/common.js';
import { LocalRecommender } from './localRules.js';
import { buildReasoningRequest, ReasoningAdvice, ReasoningClient } from './reasoningClient.js';

/**
 * 建议流水线输出
 */
export interface RecommendationOutcome {
  readonly recommendations: readonly Recommendation[];
  readonly mode: RecommendationSource;
  /** 回退到本地模式的原因 */
  readonly notice?: string;
}

export interface RecommendationPipelineOptions {
  /** 增强请求的超时（毫秒） */
  timeout: number;
  /** 增强请求体的字节上限 */
  maxRequestBytes: number;
}

const DEFAULT_OPTIONS: RecommendationPipelineOptions = {
  timeout: DefaultConfig.REASONING_TIMEOUT,
  maxRequestBytes: DefaultConfig.REASONING_MAX_REQUEST_BYTES
};

/**
 * 建议流水线
 *
 * @class RecommendationPipeline
 * @since 1.0.0
 *
 * @example
 * const pipeline = new RecommendationPipeline(new LocalRecommender(), reasoningClient);
 * const outcome = await pipeline.recommend(findings, samples, InspectionLevel.ADVANCED);
 */
export class RecommendationPipeline {
  private readonly options: RecommendationPipelineOptions;

  constructor(
    private readonly local: LocalRecommender = new LocalRecommender(),
    private readonly client?: ReasoningClient,
    options: Partial<RecommendationPipelineOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  public async recommend(
    findings: readonly Finding[],
    samples: readonly MetricSample[],
    level: InspectionLevel
  ): Promise<RecommendationOutcome> {
    if (!this.client || findings.length === 0) {
      return { recommendations: this.local.recommend(findings, samples), mode: 'local' };
    }

    try {
      const recommendations = await this.enriched(this.client, findings, samples, level);
      return { recommendations, mode: 'enriched' };
    } catch (error) {
      const safeError = ErrorHandler.safeError(error, 'RecommendationPipeline');
      logger.warn(StringConstants.MSG_REASONING_FAILED, 'RecommendationPipeline', {
        category: safeError.category,
        reason: safeError.message
      });
      return {
        recommendations: this.local.recommend(findings, samples),
        mode: 'local',
        notice: `${StringConstants.MSG_REASONING_FAILED}: ${safeError.message}`
      };
    }
  }

  private async enriched(
    client: ReasoningClient,
    findings: readonly Finding[],
    samples: readonly MetricSample[],
    level: InspectionLevel
  ): Promise<Recommendation[]> {
    const request = buildReasoningRequest(
      INSPECTION_LEVEL_NAMES[level],
      findings,
      samples,
      this.options.maxRequestBytes
    );

    const advice = await withTimeout(
      client.advise(request),
      this.options.timeout,
      () => new RecommendationServiceError(
        `${StringConstants.MSG_REASONING_TIMEOUT}（${this.options.timeout}ms）`,
        ErrorCategory.TIMEOUT_ERROR
      )
    );

    const enriched = this.mapAdvice(advice, findings);
    if (enriched.length === 0) {
      throw new RecommendationServiceError(
        `${StringConstants.MSG_REASONING_INVALID_RESPONSE}: 没有引用有效发现项的建议`,
        ErrorCategory.INVALID_RESPONSE
      );
    }

    // 推理服务没有覆盖的发现项补充本地建议
    const covered = new Set(enriched.flatMap(recommendation => recommendation.findingIds));
    const uncovered = findings.filter(finding => !covered.has(finding.id));

    return [...enriched, ...this.local.recommend(uncovered, samples)];
  }

  /**
   * 把推理服务的建议映射为 Recommendation，丢弃不引用任何已知发现项的条目
   */
  private mapAdvice(advice: readonly ReasoningAdvice[], findings: readonly Finding[]): Recommendation[] {
    const byId = new Map(findings.map(finding => [finding.id, finding]));
    const recommendations: Recommendation[] = [];

    for (const item of advice) {
      const findingIds = [...new Set(item.findingIds)].filter(id => byId.has(id));
      const first = byId.get(findingIds[0] ?? '');
      if (!first) {
        logger.debug('丢弃未引用有效发现项的增强建议', 'RecommendationPipeline', { findingIds: item.findingIds });
        continue;
      }

      recommendations.push({
        id: `enriched-${recommendations.length + 1}`,
        findingIds,
        subsystem: item.subsystem ?? first.collector,
        advice: item.advice,
        ...(item.command !== undefined ? { command: item.command } : {}),
        priority: item.priority,
        source: 'enriched',
        approval: item.command !== undefined ? 'pending' : 'not-applicable'
      });
    }

    return recommendations;
  }
}
