/**
 * InnoDB 采集器
 *
 * @fileoverview 缓冲池、数据读写与行锁计数
 * @since 1.0.0
 */

import { Session } from '../connection.js';
import { MetricSample } from '../types.js';
import { NumberUtils } from '../utils/common.js';
import { BaseCollector, variableFilter } from './baseCollector.js';

const STATUS_NAMES = [
  'Innodb_buffer_pool_read_requests',
  'Innodb_buffer_pool_reads',
  'Innodb_buffer_pool_pages_total',
  'Innodb_buffer_pool_pages_free',
  'Innodb_buffer_pool_pages_dirty',
  'Innodb_data_reads',
  'Innodb_data_writes',
  'Innodb_row_lock_waits',
  'Innodb_row_lock_current_waits',
  'Innodb_row_lock_time_avg'
];

export class InnoDBCollector extends BaseCollector {
  public readonly name = 'innodb' as const;

  public async collect(session: Session): Promise<MetricSample[]> {
    const status = await this.readVariables(session, `SHOW GLOBAL STATUS ${variableFilter(STATUS_NAMES)}`);
    const variables = await this.readVariables(session, "SHOW GLOBAL VARIABLES LIKE 'innodb_buffer_pool_size'");

    return this.buffer()
      .number('innodb.buffer_pool.read_requests', status.get('innodb_buffer_pool_read_requests'))
      .number('innodb.buffer_pool.reads', status.get('innodb_buffer_pool_reads'))
      .number('innodb.buffer_pool.pages_total', status.get('innodb_buffer_pool_pages_total'))
      .number('innodb.buffer_pool.pages_free', status.get('innodb_buffer_pool_pages_free'))
      .number('innodb.buffer_pool.pages_dirty', status.get('innodb_buffer_pool_pages_dirty'))
      .number('innodb.buffer_pool.size_bytes', variables.get('innodb_buffer_pool_size'))
      .number('innodb.data.reads', status.get('innodb_data_reads'))
      .number('innodb.data.writes', status.get('innodb_data_writes'))
      .number('innodb.row_lock.waits', status.get('innodb_row_lock_waits'))
      .number('innodb.row_lock.current_waits', status.get('innodb_row_lock_current_waits'))
      // 服务器以毫秒报告平均行锁等待
      .duration('innodb.row_lock.time_avg', NumberUtils.toNumber(status.get('innodb_row_lock_time_avg')))
      .toArray();
  }
}
