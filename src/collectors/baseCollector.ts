/**
 * 采集器基类
 *
 * 所有采集器实现同一能力：collect(session) -> 指标样本序列。
 * 采集器只发出只读语句，失败时直接抛出，由 CollectorSet 在边界处记录。
 *
 * @fileoverview 采集器基类与样本缓冲
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { Row, Session } from '../connection.js';
import { CHECK_TITLES, CheckName, MetricSample } from '../types.js';
import { NumberUtils } from '../utils/common.js';

/**
 * 采集器运行参数
 */
export interface CollectorOptions {
  /** 统计磁盘使用率的挂载点 */
  diskPath: string;
  /** 表统计最多读取的表数 */
  maxTables: number;
  /** 语句平均延迟告警界限（毫秒） */
  highLatencyMs: number;
}

/**
 * 采集能力
 */
export interface MetricCollector {
  readonly name: CheckName;
  readonly title: string;
  collect(session: Session): Promise<MetricSample[]>;
}

/**
 * 采集器构造函数类型
 */
export type CollectorConstructor = new (options: CollectorOptions) => BaseCollector;

/**
 * 样本缓冲
 *
 * 每个样本在写入时打上自己的采集时间；无法转换为数值的原始值直接跳过。
 */
export class MetricBuffer {
  private readonly samples: MetricSample[] = [];

  constructor(private readonly collector: CheckName) {}

  public number(name: string, raw: unknown): this {
    const value = NumberUtils.toNumber(raw);
    if (value !== undefined) {
      this.push(name, value);
    }
    return this;
  }

  /**
   * 写入时长样本
   *
   * @param name - 指标名
   * @param milliseconds - 毫秒数，undefined 时跳过
   */
  public duration(name: string, milliseconds: number | undefined): this {
    if (milliseconds !== undefined && Number.isFinite(milliseconds)) {
      this.push(name, { milliseconds });
    }
    return this;
  }

  public text(name: string, raw: unknown): this {
    if (raw !== undefined && raw !== null) {
      this.push(name, String(raw));
    }
    return this;
  }

  public toArray(): MetricSample[] {
    return [...this.samples];
  }

  private push(name: string, value: MetricSample['value']): void {
    this.samples.push({
      name,
      value,
      collector: this.collector,
      capturedAt: new Date().toISOString()
    });
  }
}

/**
 * 采集器基类
 *
 * @abstract
 * @class BaseCollector
 * @since 1.0.0
 */
export abstract class BaseCollector implements MetricCollector {
  public abstract readonly name: CheckName;

  constructor(protected readonly options: CollectorOptions) {}

  public get title(): string {
    return CHECK_TITLES[this.name];
  }

  public abstract collect(session: Session): Promise<MetricSample[]>;

  protected buffer(): MetricBuffer {
    return new MetricBuffer(this.name);
  }

  /**
   * 读取 SHOW STATUS / SHOW VARIABLES 结果为小写名称到值的映射
   */
  protected async readVariables(session: Session, statement: string): Promise<Map<string, string>> {
    const rows = await session.execute(statement);
    const variables = new Map<string, string>();

    for (const row of rows) {
      const name = column(row, 'Variable_name');
      const value = column(row, 'Value');
      if (typeof name === 'string') {
        variables.set(name.toLowerCase(), value === null || value === undefined ? '' : String(value));
      }
    }

    return variables;
  }
}

/**
 * 按列名读取，不区分大小写
 */
export function column(row: Row, name: string): unknown {
  if (name in row) {
    return row[name];
  }
  const lower = name.toLowerCase();
  const key = Object.keys(row).find(candidate => candidate.toLowerCase() === lower);
  return key === undefined ? undefined : row[key];
}

/**
 * 把 IN 列表拼入 SHOW ... WHERE 语句
 */
export function variableFilter(names: readonly string[]): string {
  return `WHERE Variable_name IN (${names.map(name => `'${name}'`).join(', ')})`;
}
