/**
 * 慢查询采集器
 *
 * 读取慢查询日志配置与累计计数；慢查询日志写入表时，
 * 再从 mysql.slow_log 读取最近的记录。
 *
 * @fileoverview 慢查询配置、计数与最近记录
 * @since 1.0.0
 */

import { Session } from '../connection.js';
import { DefaultConfig } from '../constants.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import { MetricSample } from '../types.js';
import { NumberUtils, TimeUtils } from '../utils/common.js';
import { BaseCollector, column, MetricBuffer, variableFilter } from './baseCollector.js';

export class SlowQueryCollector extends BaseCollector {
  public readonly name = 'slow_queries' as const;

  public async collect(session: Session): Promise<MetricSample[]> {
    const variables = await this.readVariables(
      session,
      `SHOW GLOBAL VARIABLES ${variableFilter(['slow_query_log', 'long_query_time', 'log_output'])}`
    );
    const status = await this.readVariables(session, `SHOW GLOBAL STATUS ${variableFilter(['Slow_queries', 'Uptime'])}`);

    const enabled = (variables.get('slow_query_log') ?? '').toUpperCase();
    const logOutput = (variables.get('log_output') ?? '').toUpperCase();
    const longQueryTime = NumberUtils.toNumber(variables.get('long_query_time'));
    const uptime = NumberUtils.toNumber(status.get('uptime'));

    const buffer = this.buffer()
      .text('slow_queries.log_enabled', enabled || undefined)
      .text('slow_queries.log_output', logOutput || undefined)
      .duration('slow_queries.long_query_time', longQueryTime === undefined ? undefined : longQueryTime * 1000)
      .number('slow_queries.total', status.get('slow_queries'))
      .duration('slow_queries.uptime', uptime === undefined ? undefined : uptime * 1000);

    if ((enabled === 'ON' || enabled === '1') && logOutput.split(',').includes('TABLE')) {
      await this.collectRecent(session, buffer);
    }

    return buffer.toArray();
  }

  /**
   * 读取最近的慢查询记录；权限不足时只记录日志，其余指标照常返回
   */
  private async collectRecent(session: Session, buffer: MetricBuffer): Promise<void> {
    try {
      const rows = await session.execute(
        `SELECT start_time, query_time, sql_text FROM mysql.slow_log ORDER BY start_time DESC LIMIT ${DefaultConfig.SLOW_LOG_SAMPLE_SIZE}`
      );
      const times = rows
        .map(row => TimeUtils.parseTimeToMs(column(row, 'query_time')))
        .filter((value): value is number => value !== undefined);

      buffer
        .number('slow_queries.recent_count', rows.length)
        .duration('slow_queries.recent_max_time', times.length > 0 ? Math.max(...times) : undefined);
    } catch (error) {
      logger.warn('读取 mysql.slow_log 失败', 'SlowQueryCollector', {
        reason: ErrorHandler.messageOf(error)
      });
      buffer.text('slow_queries.recent_status', 'unavailable');
    }
  }
}
