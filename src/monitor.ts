/**
 * MySQL 健康巡检
 *
 * 一次巡检是一条线性流水线：等级策略解析检查项，在单个会话内依次采集，
 * 关闭会话后做派生与阈值分析，再生成建议（可选审批），最后组装报告。
 * 只有连接失败会中止巡检，其余失败都体现为报告中的降级章节或本地回退。
 *
 * @fileoverview 巡检编排
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { DatabaseConfig, MonitoringConfig, ReasoningConfig } from './config.js';
import { Connector, MySQLConnector, withSession } from './connection.js';
import { CollectorRegistry } from './collectors/collectorRegistry.js';
import { CollectorSet } from './collectors/collectorSet.js';
import { LevelPolicy } from './levelPolicy.js';
import { AnalysisEngine } from './analysis/analysisEngine.js';
import { LocalRecommender } from './recommendations/localRules.js';
import { AnthropicReasoningClient } from './recommendations/reasoningClient.js';
import { RecommendationPipeline } from './recommendations/recommendationPipeline.js';
import { ApprovalGate, applyApprovals } from './recommendations/approval.js';
import { ReportBuilder } from './report/reportBuilder.js';
import { logger } from './logger.js';
import { INSPECTION_LEVEL_NAMES, Report } from './types.js';
import { IdUtils, TimeUtils } from './utils/common.js';

/**
 * 巡检所需的配置
 */
export interface HealthMonitorConfig {
  database: DatabaseConfig;
  monitoring: MonitoringConfig;
}

/**
 * 可替换的协作者，测试中注入假实现
 */
export interface HealthMonitorDependencies {
  connector: Connector;
  registry: CollectorRegistry;
  pipeline: RecommendationPipeline;
  /** 未提供时建议保持 pending */
  approvalGate?: ApprovalGate;
  clock: () => Date;
}

/**
 * 按推理服务配置创建建议流水线：未配置 API Key 时只用本地规则
 */
export function createRecommendationPipeline(reasoning: ReasoningConfig): RecommendationPipeline {
  const client = reasoning.enabled ? new AnthropicReasoningClient(reasoning) : undefined;
  return new RecommendationPipeline(new LocalRecommender(), client, {
    timeout: reasoning.timeout,
    maxRequestBytes: reasoning.maxRequestBytes
  });
}

/**
 * 健康巡检
 *
 * @class HealthMonitor
 * @since 1.0.0
 *
 * @example
 * const configManager = new ConfigurationManager();
 * const monitor = new HealthMonitor(configManager, {
 *   pipeline: createRecommendationPipeline(configManager.reasoning)
 * });
 * const report = await monitor.run();
 */
export class HealthMonitor {
  private readonly dependencies: HealthMonitorDependencies;

  constructor(
    private readonly config: HealthMonitorConfig,
    dependencies: Partial<HealthMonitorDependencies> = {}
  ) {
    this.dependencies = {
      connector: dependencies.connector ?? new MySQLConnector(),
      registry: dependencies.registry ?? new CollectorRegistry(),
      pipeline: dependencies.pipeline ?? new RecommendationPipeline(),
      approvalGate: dependencies.approvalGate,
      clock: dependencies.clock ?? (() => new Date())
    };
  }

  /**
   * 执行一次巡检
   *
   * @throws {ConnectionError} 连接重试耗尽，此时不产生报告
   */
  public async run(): Promise<Report> {
    const { connector, registry, pipeline, approvalGate, clock } = this.dependencies;
    const { database, monitoring } = this.config;
    const startTime = TimeUtils.now();

    logger.setRunId(IdUtils.generateShortId());
    try {
      const resolved = LevelPolicy.resolve(
        {
          level: monitoring.level,
          enabledChecks: monitoring.enabledChecks,
          enableTableStatistics: monitoring.enableTableStatistics
        },
        registry
      );
      logger.info('巡检开始', 'HealthMonitor', {
        level: INSPECTION_LEVEL_NAMES[resolved.level],
        checks: resolved.checks,
        skipped: resolved.skipped.map(entry => entry.check)
      });

      const collectorSet = new CollectorSet(
        {
          diskPath: monitoring.diskPath,
          maxTables: monitoring.maxTables,
          highLatencyMs: monitoring.highLatencyMs
        },
        registry
      );
      const { identity, collection } = await withSession(connector, database, async session => ({
        identity: session.identity,
        collection: await collectorSet.run(session, resolved.checks)
      }));

      const analysis = AnalysisEngine.analyze(collection.samples, monitoring.thresholds);
      const outcome = await pipeline.recommend(analysis.findings, analysis.samples, resolved.level);
      const recommendations = approvalGate
        ? await applyApprovals(outcome.recommendations, approvalGate)
        : outcome.recommendations;

      const report = new ReportBuilder(clock().toISOString())
        .withConnection(identity)
        .withChecks(resolved)
        .withSamples(analysis.samples, collection.failures)
        .withFindings(analysis.findings)
        .withRecommendations(recommendations, outcome.mode, outcome.notice)
        .build();

      logger.info('巡检完成', 'HealthMonitor', {
        findings: report.findings.length,
        recommendations: report.recommendations.length,
        degraded: report.degraded,
        durationMs: TimeUtils.getDurationInMs(startTime)
      });
      return report;
    } finally {
      logger.setRunId(undefined);
    }
  }
}
