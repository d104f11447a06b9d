/**
 * 测试用的脚本化会话
 *
 * 按语句前缀（或正则）返回预设的结果行，记录执行过的语句。
 */

import { Row, Session } from '../../src/connection.js';
import { ErrorCategory, QueryError } from '../../src/types.js';

export type ScriptStep = [matcher: string | RegExp, result: Row[] | Error];

export class ScriptedSession implements Session {
  public readonly identity = { host: 'db.test', port: 3306, user: 'monitor' };
  public readonly statements: string[] = [];
  public closed = false;

  constructor(private readonly script: ScriptStep[] = []) {}

  public async execute(statement: string): Promise<Row[]> {
    this.statements.push(statement);
    const step = this.script.find(([matcher]) =>
      typeof matcher === 'string' ? statement.startsWith(matcher) : matcher.test(statement)
    );
    if (!step) {
      throw new QueryError(`未预期的语句: ${statement}`, ErrorCategory.SYNTAX_ERROR, statement);
    }
    const [, result] = step;
    if (result instanceof Error) {
      throw result;
    }
    return result.map(row => ({ ...row }));
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * SHOW STATUS / SHOW VARIABLES 形式的结果行
 */
export function variableRows(values: Record<string, string | number>): Row[] {
  return Object.entries(values).map(([name, value]) => ({ Variable_name: name, Value: String(value) }));
}

export const COLLECTOR_OPTIONS = { diskPath: '/', maxTables: 50, highLatencyMs: 1000 };
