/**
 * 连接状态采集器
 *
 * @fileoverview 服务器版本、运行时间、连接计数与进程列表
 * @since 1.0.0
 */

import { Session } from '../connection.js';
import { DefaultConfig } from '../constants.js';
import { MetricSample } from '../types.js';
import { NumberUtils } from '../utils/common.js';
import { BaseCollector, column, variableFilter } from './baseCollector.js';

const STATUS_NAMES = [
  'Threads_connected',
  'Threads_running',
  'Max_used_connections',
  'Aborted_connects',
  'Aborted_clients',
  'Connections',
  'Uptime'
];

/** 计入长时间运行的命令类型；Daemon、Binlog Dump、Connect 等服务器线程不计入 */
const STATEMENT_COMMANDS = new Set(['Query', 'Execute']);

export class ConnectionStatsCollector extends BaseCollector {
  public readonly name = 'connection_stats' as const;

  public async collect(session: Session): Promise<MetricSample[]> {
    const [versionRow] = await session.execute('SELECT VERSION() AS version');
    const status = await this.readVariables(session, `SHOW GLOBAL STATUS ${variableFilter(STATUS_NAMES)}`);
    const variables = await this.readVariables(
      session,
      `SHOW GLOBAL VARIABLES ${variableFilter(['max_connections', 'wait_timeout'])}`
    );
    const processes = await session.execute('SHOW FULL PROCESSLIST');

    const longRunning = processes.filter(row => {
      const command = column(row, 'Command');
      if (typeof command !== 'string' || !STATEMENT_COMMANDS.has(command) || column(row, 'User') === 'system user') {
        return false;
      }
      const time = NumberUtils.toNumber(column(row, 'Time')) ?? 0;
      return time > DefaultConfig.LONG_RUNNING_SECONDS;
    });

    const uptime = NumberUtils.toNumber(status.get('uptime'));
    const waitTimeout = NumberUtils.toNumber(variables.get('wait_timeout'));

    return this.buffer()
      .text('server.version', versionRow ? column(versionRow, 'version') : undefined)
      .duration('server.uptime', uptime === undefined ? undefined : uptime * 1000)
      .number('connections.threads_connected', status.get('threads_connected'))
      .number('connections.threads_running', status.get('threads_running'))
      .number('connections.max_used', status.get('max_used_connections'))
      .number('connections.aborted_connects', status.get('aborted_connects'))
      .number('connections.aborted_clients', status.get('aborted_clients'))
      .number('connections.total', status.get('connections'))
      .number('connections.max_connections', variables.get('max_connections'))
      .duration('connections.wait_timeout', waitTimeout === undefined ? undefined : waitTimeout * 1000)
      .number('connections.process_count', processes.length)
      .number('connections.long_running_queries', longRunning.length)
      .toArray();
  }
}
