/**
 * MySQL 连接器 - 带重试的只读巡检会话
 *
 * 每次巡检建立一个会话，所有采集器顺序复用。连接建立通过智能重试策略进行，
 * 每次尝试都是全新的连接并受单独的超时控制；重试耗尽后抛出 ConnectionError，
 * 整次巡检随之终止。会话只接受只读语句，每条语句带查询超时。
 *
 * @fileoverview MySQL 巡检会话管理
 * @version 1.0.0
 * @since 1.0.0
 * @license MIT
 */

import { createConnection, ConnectionOptions } from 'mysql2/promise';
import { DatabaseConfig } from './config.js';
import { DefaultConfig, StringConstants } from './constants.js';
import { ErrorHandler } from './errorHandler.js';
import { logger } from './logger.js';
import { SmartRetryStrategy } from './retryStrategy.js';
import {
  ConnectionError,
  ConnectionIdentity,
  ErrorCategory,
  ErrorSeverity,
  MonitorError,
  QueryError
} from './types.js';
import { withTimeout } from './utils/common.js';

/**
 * 查询结果行
 */
export type Row = Record<string, unknown>;

/**
 * 巡检会话
 *
 * @interface Session
 * @since 1.0.0
 */
export interface Session {
  /** 连接身份，不含密码 */
  readonly identity: ConnectionIdentity;

  /**
   * 执行只读语句
   *
   * @throws {QueryError} 语句不是只读、执行失败或超时
   */
  execute(statement: string): Promise<Row[]>;

  /** 关闭会话，可重复调用 */
  close(): Promise<void>;
}

/**
 * 连接器
 */
export interface Connector {
  /**
   * @throws {ConnectionError} 重试耗尽
   */
  connect(config: DatabaseConfig): Promise<Session>;
}

/**
 * 驱动连接中会话用到的部分
 */
export interface DriverConnection {
  query(options: { sql: string; timeout?: number }): Promise<[unknown, unknown]>;
  end(): Promise<void>;
  destroy(): void;
}

export type ConnectionFactory = (options: ConnectionOptions) => Promise<DriverConnection>;

const READ_ONLY_KEYWORDS = ['SELECT', 'SHOW', 'DESCRIBE', 'DESC', 'EXPLAIN'];

/**
 * 判断语句是否为单条只读语句
 *
 * 去掉前导注释后按首个关键字判断，并拒绝以分号拼接的多条语句。
 */
export function isReadOnlyStatement(statement: string): boolean {
  const stripped = statement
    .replace(/^(\s*(\/\*[\s\S]*?\*\/|--[^\n]*\n|#[^\n]*\n))*/, '')
    .trim()
    .replace(/;\s*$/, '');

  if (stripped.length === 0 || stripped.includes(';')) {
    return false;
  }

  const keyword = /^[A-Za-z]+/.exec(stripped)?.[0].toUpperCase();
  return keyword !== undefined && READ_ONLY_KEYWORDS.includes(keyword);
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 基于 mysql2 连接的会话实现
 */
class MySQLSession implements Session {
  private closed = false;

  constructor(
    public readonly identity: ConnectionIdentity,
    private readonly connection: DriverConnection,
    private readonly queryTimeoutMs: number
  ) {}

  public async execute(statement: string): Promise<Row[]> {
    if (this.closed) {
      throw new QueryError(StringConstants.MSG_SESSION_CLOSED, ErrorCategory.CONNECTION_ERROR, statement);
    }

    if (!isReadOnlyStatement(statement)) {
      throw new QueryError(
        `${StringConstants.MSG_STATEMENT_NOT_READ_ONLY}: ${statement.slice(0, DefaultConfig.MAX_LOG_DETAIL_LENGTH)}`,
        ErrorCategory.SECURITY_VIOLATION,
        statement
      );
    }

    try {
      const [rows] = await this.connection.query({ sql: statement, timeout: this.queryTimeoutMs });
      return Array.isArray(rows) ? rows.filter(isRow).map(row => ({ ...row })) : [];
    } catch (error) {
      const safeError = ErrorHandler.safeError(error);
      throw new QueryError(
        `${StringConstants.MSG_QUERY_FAILED}: ${safeError.message}`,
        safeError.category,
        statement,
        error instanceof Error ? error : undefined
      );
    }
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.connection.end();
      logger.debug('数据库会话已关闭', 'MySQLConnector', { ...this.identity });
    } catch (error) {
      logger.warn('关闭会话失败，强制断开', 'MySQLConnector', {
        ...this.identity,
        reason: ErrorHandler.messageOf(error)
      });
      this.connection.destroy();
    }
  }
}

/**
 * MySQL 连接器
 *
 * @class MySQLConnector
 * @since 1.0.0
 *
 * @example
 * const connector = new MySQLConnector();
 * const session = await connector.connect(config.database);
 */
export class MySQLConnector implements Connector {
  constructor(private readonly factory: ConnectionFactory = options => createConnection(options)) {}

  public async connect(config: DatabaseConfig): Promise<Session> {
    const identity: ConnectionIdentity = { host: config.host, port: config.port, user: config.user };

    const result = await SmartRetryStrategy.executeWithRetry(
      () => this.openConnection(config),
      {
        maxAttempts: config.retryAttempts,
        baseDelay: config.retryDelay,
        maxDelay: Math.max(config.retryDelay, DefaultConfig.RETRY_MAX_DELAY)
      },
      {
        operation: 'MySQLConnector.connect',
        timestamp: new Date(),
        metadata: { ...identity }
      }
    );

    if (!result.success || result.finalResult === undefined) {
      const reason = result.lastError?.message ?? StringConstants.MSG_CONNECTION_FAILED;
      logger.error(StringConstants.MSG_CONNECTION_RETRY_EXHAUSTED, 'MySQLConnector', result.lastError, {
        ...identity,
        attempts: result.attempts
      });
      throw new ConnectionError(
        `${StringConstants.MSG_CONNECTION_RETRY_EXHAUSTED}（${result.attempts} 次）: ${reason}`,
        result.attempts,
        result.lastError
      );
    }

    logger.info('数据库会话已建立', 'MySQLConnector', { ...identity, attempts: result.attempts });
    return new MySQLSession(identity, result.finalResult, config.queryTimeout * 1000);
  }

  /**
   * 单次连接尝试；超时后到达的连接直接销毁
   */
  private openConnection(config: DatabaseConfig): Promise<DriverConnection> {
    const options: ConnectionOptions = {
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      connectTimeout: config.connectTimeout * 1000,
      charset: StringConstants.CHARSET,
      multipleStatements: false,
      ssl: config.sslEnabled ? {} : undefined
    };

    return withTimeout(
      this.factory(options),
      config.connectTimeout * 1000,
      () => new MonitorError(
        `${StringConstants.MSG_CONNECT_TIMEOUT}（${config.connectTimeout}s）`,
        ErrorCategory.TIMEOUT_ERROR,
        ErrorSeverity.MEDIUM
      ),
      late => late.destroy()
    );
  }
}

/**
 * 在一个会话内执行操作，任何退出路径都会关闭会话
 *
 * @example
 * const samples = await withSession(connector, config.database, session => collectorSet.run(session, checks));
 */
export async function withSession<T>(
  connector: Connector,
  config: DatabaseConfig,
  fn: (session: Session) => Promise<T>
): Promise<T> {
  const session = await connector.connect(config);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
