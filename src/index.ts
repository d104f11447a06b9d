#!/usr/bin/env node
/**
 * MySQL 健康巡检 - 命令行入口与公共 API
 *
 * 直接运行时从环境变量（及 .env）读取配置，执行一次巡检，
 * 把文本报告写到 stdout，并按配置的格式落盘。日志统一写 stderr。
 * 连接失败时不产生报告，进程以非零状态退出。
 *
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { ConfigurationManager } from './config.js';
import { HealthMonitor, createRecommendationPipeline } from './monitor.js';
import { ConsoleApprovalGate } from './recommendations/approval.js';
import { ReportWriter } from './report/reportWriter.js';
import { renderText } from './report/renderers.js';
import { logger } from './logger.js';
import { ConnectionError } from './types.js';
import { ErrorHandler } from './errorHandler.js';

export * from './types.js';
export { ConfigurationManager } from './config.js';
export type { DatabaseConfig, MonitoringConfig, ReasoningConfig, ReportConfig } from './config.js';
export { MySQLConnector, withSession, isReadOnlyStatement } from './connection.js';
export type { Connector, Session, Row } from './connection.js';
export { CollectorRegistry } from './collectors/collectorRegistry.js';
export { CollectorSet } from './collectors/collectorSet.js';
export { BaseCollector, MetricBuffer } from './collectors/baseCollector.js';
export type { MetricCollector, CollectorOptions } from './collectors/baseCollector.js';
export { LevelPolicy, LEVEL_DEFAULT_CHECKS } from './levelPolicy.js';
export { AnalysisEngine } from './analysis/analysisEngine.js';
export { deriveIndicators } from './analysis/derivedIndicators.js';
export { DEFAULT_THRESHOLDS } from './analysis/thresholds.js';
export { LocalRecommender, LOCAL_RULES } from './recommendations/localRules.js';
export { AnthropicReasoningClient } from './recommendations/reasoningClient.js';
export type { ReasoningClient, ReasoningRequest, ReasoningAdvice } from './recommendations/reasoningClient.js';
export { RecommendationPipeline } from './recommendations/recommendationPipeline.js';
export { applyApprovals, transitionApproval, ConsoleApprovalGate } from './recommendations/approval.js';
export type { ApprovalGate } from './recommendations/approval.js';
export { ReportBuilder } from './report/reportBuilder.js';
export { renderText, renderJson, renderCsv, toRecords } from './report/renderers.js';
export { ReportWriter } from './report/reportWriter.js';
export { ExporterFactory } from './exporter/exporterFactory.js';
export { HealthMonitor, createRecommendationPipeline } from './monitor.js';
export { logger } from './logger.js';

/**
 * 执行一次巡检并输出报告
 *
 * @returns 进程退出码：0 成功，1 连接失败或意外错误
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const configManager = new ConfigurationManager(env);
  logger.debug('配置已加载', 'Main', configManager.toObject());

  const approvalGate = configManager.report.interactiveApproval ? new ConsoleApprovalGate() : undefined;

  try {
    const monitor = new HealthMonitor(configManager, {
      pipeline: createRecommendationPipeline(configManager.reasoning),
      approvalGate
    });
    const report = await monitor.run();

    process.stdout.write(renderText(report));
    await new ReportWriter(configManager.report).write(report);
    return 0;
  } catch (error) {
    if (error instanceof ConnectionError) {
      logger.fatal('无法连接数据库，未生成报告', 'Main', error, { attempts: error.attempts });
    } else {
      logger.fatal('巡检异常终止', 'Main', ErrorHandler.safeError(error, 'main'));
    }
    return 1;
  } finally {
    approvalGate?.close();
    await logger.flush();
  }
}

if (require.main === module) {
  void main().then(code => {
    process.exitCode = code;
  });
}
