/**
 * 采集器集合
 *
 * 在同一会话上按顺序运行等级策略选出的采集器。任何一个采集器失败都在这里被捕获，
 * 记录为 (采集器, 错误) 对，不影响其余采集器；全部失败也是可以出报告的结果。
 *
 * @fileoverview 采集执行与失败隔离
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { Session } from '../connection.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import { CheckName, CollectorFailure, MetricSample } from '../types.js';
import { StringConstants } from '../constants.js';
import { TimeUtils } from '../utils/common.js';
import { CollectorOptions } from './baseCollector.js';
import { CollectorRegistry } from './collectorRegistry.js';

/**
 * 采集结果
 */
export interface CollectionResult {
  /** 所有成功采集器的样本并集，按采集顺序 */
  readonly samples: readonly MetricSample[];
  readonly failures: readonly CollectorFailure[];
  /** 成功完成的采集器 */
  readonly completed: readonly CheckName[];
}

/**
 * 采集器集合
 *
 * @class CollectorSet
 * @since 1.0.0
 *
 * @example
 * const collectorSet = new CollectorSet(options);
 * const { samples, failures } = await collectorSet.run(session, resolved.checks);
 */
export class CollectorSet {
  constructor(
    private readonly options: CollectorOptions,
    private readonly registry: CollectorRegistry = new CollectorRegistry()
  ) {}

  public async run(session: Session, checks: readonly CheckName[]): Promise<CollectionResult> {
    const samples: MetricSample[] = [];
    const failures: CollectorFailure[] = [];
    const completed: CheckName[] = [];

    for (const check of checks) {
      const startTime = TimeUtils.now();

      try {
        const collector = this.registry.create(check, this.options);
        const collected = await collector.collect(session);
        // 样本一律归属于产生它的检查项
        samples.push(...collected.filter(sample => sample.collector === check));
        completed.push(check);

        logger.debug('采集完成', 'CollectorSet', {
          collector: check,
          samples: collected.length,
          durationMs: TimeUtils.getDurationInMs(startTime)
        });
      } catch (error) {
        const safeError = ErrorHandler.safeError(error, check);
        failures.push({ collector: check, category: safeError.category, message: safeError.message });

        logger.warn(`${StringConstants.MSG_COLLECTOR_FAILED}: ${check}`, 'CollectorSet', {
          collector: check,
          category: safeError.category,
          reason: safeError.message,
          durationMs: TimeUtils.getDurationInMs(startTime)
        });
      }
    }

    return { samples, failures, completed };
  }
}
