/**
 * Performance Schema 采集器
 *
 * 语句摘要按总等待时间取前 N 条，汇总为最大平均延迟、总延迟与超过延迟界限的条数；
 * 元数据锁按已持有与等待中计数。performance_schema 关闭时只报告开关状态。
 *
 * @fileoverview 语句摘要与元数据锁
 * @since 1.0.0
 */

import { Session } from '../connection.js';
import { DefaultConfig } from '../constants.js';
import { MetricSample } from '../types.js';
import { NumberUtils } from '../utils/common.js';
import { BaseCollector, column } from './baseCollector.js';

/** 计时器单位为皮秒 */
const PICOSECONDS_PER_MS = 1e9;

export class PerformanceSchemaCollector extends BaseCollector {
  public readonly name = 'performance_schema' as const;

  public async collect(session: Session): Promise<MetricSample[]> {
    const variables = await this.readVariables(session, "SHOW GLOBAL VARIABLES LIKE 'performance_schema'");
    const enabled = (variables.get('performance_schema') ?? 'OFF').toUpperCase();
    const buffer = this.buffer().text('performance_schema.enabled', enabled);

    if (enabled !== 'ON' && enabled !== '1') {
      return buffer.toArray();
    }

    const digests = await session.execute(
      'SELECT DIGEST_TEXT AS digest_text, COUNT_STAR AS count_star, SUM_TIMER_WAIT AS sum_timer_wait, ' +
      'AVG_TIMER_WAIT AS avg_timer_wait FROM performance_schema.events_statements_summary_by_digest ' +
      `ORDER BY SUM_TIMER_WAIT DESC LIMIT ${DefaultConfig.STATEMENT_DIGEST_LIMIT}`
    );
    const averages = digests.map(row => (NumberUtils.toNumber(column(row, 'avg_timer_wait')) ?? 0) / PICOSECONDS_PER_MS);
    const total = digests.reduce(
      (sum, row) => sum + (NumberUtils.toNumber(column(row, 'sum_timer_wait')) ?? 0) / PICOSECONDS_PER_MS,
      0
    );

    const [locks] = await session.execute(
      "SELECT SUM(LOCK_STATUS = 'GRANTED') AS held, SUM(LOCK_STATUS = 'PENDING') AS pending " +
      'FROM performance_schema.metadata_locks'
    );

    return buffer
      .number('performance_schema.statements.digest_count', digests.length)
      .duration('performance_schema.statements.max_avg_latency', averages.length > 0 ? Math.max(...averages) : 0)
      .duration('performance_schema.statements.total_latency', total)
      .number(
        'performance_schema.statements.high_latency_count',
        averages.filter(latency => latency > this.options.highLatencyMs).length
      )
      .number('performance_schema.metadata_locks.held', (locks && NumberUtils.toNumber(column(locks, 'held'))) ?? 0)
      .number('performance_schema.metadata_locks.pending', (locks && NumberUtils.toNumber(column(locks, 'pending'))) ?? 0)
      .toArray();
  }
}
