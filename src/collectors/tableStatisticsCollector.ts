/**
 * 表统计采集器
 *
 * 扫描 information_schema 中的表与索引元数据，代价随库表规模增长，
 * 因此只在 Expert 等级并显式启用时运行。按数据量从大到小最多读取
 * maxTables 张表，系统库不计入。
 *
 * 指标名形如 tables.<库>.<表>.data_bytes，名称中的点号替换为下划线以保持分段；
 * 原始库名与表名另存为 schema_name 与 table_name 文本样本，生成语句时以它们为准。
 *
 * @fileoverview 表与索引统计
 * @since 1.0.0
 */

import { Session } from '../connection.js';
import { MetricSample } from '../types.js';
import { NumberUtils } from '../utils/common.js';
import { BaseCollector, column } from './baseCollector.js';

const SYSTEM_SCHEMAS = "('mysql', 'information_schema', 'performance_schema', 'sys')";

function segment(name: unknown): string {
  return String(name ?? '').replace(/\./g, '_');
}

export class TableStatisticsCollector extends BaseCollector {
  public readonly name = 'table_statistics' as const;

  public async collect(session: Session): Promise<MetricSample[]> {
    const limit = Math.max(1, Math.floor(this.options.maxTables));

    const tables = await session.execute(
      'SELECT TABLE_SCHEMA AS table_schema, TABLE_NAME AS table_name, ENGINE AS engine, TABLE_ROWS AS table_rows, ' +
      'DATA_LENGTH AS data_length, INDEX_LENGTH AS index_length, DATA_FREE AS data_free ' +
      `FROM information_schema.TABLES WHERE TABLE_TYPE = 'BASE TABLE' AND TABLE_SCHEMA NOT IN ${SYSTEM_SCHEMAS} ` +
      `ORDER BY DATA_LENGTH DESC LIMIT ${limit}`
    );
    const indexRows = await session.execute(
      'SELECT TABLE_SCHEMA AS table_schema, TABLE_NAME AS table_name, COUNT(DISTINCT INDEX_NAME) AS index_count ' +
      `FROM information_schema.STATISTICS WHERE TABLE_SCHEMA NOT IN ${SYSTEM_SCHEMAS} ` +
      'GROUP BY TABLE_SCHEMA, TABLE_NAME'
    );

    const indexCounts = new Map<string, number>();
    for (const row of indexRows) {
      const key = `${segment(column(row, 'table_schema'))}.${segment(column(row, 'table_name'))}`;
      indexCounts.set(key, NumberUtils.toNumber(column(row, 'index_count')) ?? 0);
    }

    const buffer = this.buffer();
    let totalData = 0;
    let totalIndex = 0;

    for (const row of tables) {
      const key = `${segment(column(row, 'table_schema'))}.${segment(column(row, 'table_name'))}`;
      const prefix = `tables.${key}`;
      const dataBytes = NumberUtils.toNumber(column(row, 'data_length')) ?? 0;
      const indexBytes = NumberUtils.toNumber(column(row, 'index_length')) ?? 0;
      totalData += dataBytes;
      totalIndex += indexBytes;

      buffer
        .text(`${prefix}.schema_name`, column(row, 'table_schema'))
        .text(`${prefix}.table_name`, column(row, 'table_name'))
        .text(`${prefix}.engine`, column(row, 'engine'))
        .number(`${prefix}.rows`, column(row, 'table_rows'))
        .number(`${prefix}.data_bytes`, dataBytes)
        .number(`${prefix}.index_bytes`, indexBytes)
        .number(`${prefix}.free_bytes`, column(row, 'data_free'))
        .number(`${prefix}.index_count`, indexCounts.get(key) ?? 0);
    }

    return buffer
      .number('tables.count', tables.length)
      .number('tables.total_data_bytes', totalData)
      .number('tables.total_index_bytes', totalIndex)
      .toArray();
  }
}
