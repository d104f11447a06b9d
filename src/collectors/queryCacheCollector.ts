/**
 * 查询缓存采集器
 *
 * MySQL 8.0 已移除查询缓存，此时只报告 query_cache.type = UNAVAILABLE。
 *
 * @fileoverview 查询缓存配置与计数
 * @since 1.0.0
 */

import { Session } from '../connection.js';
import { MetricSample } from '../types.js';
import { BaseCollector } from './baseCollector.js';

export class QueryCacheCollector extends BaseCollector {
  public readonly name = 'query_cache' as const;

  public async collect(session: Session): Promise<MetricSample[]> {
    const variables = await this.readVariables(session, "SHOW GLOBAL VARIABLES LIKE 'query_cache%'");
    const buffer = this.buffer();

    if (!variables.has('query_cache_type')) {
      return buffer.text('query_cache.type', 'UNAVAILABLE').toArray();
    }

    const status = await this.readVariables(session, "SHOW GLOBAL STATUS LIKE 'Qcache%'");

    return buffer
      .text('query_cache.type', variables.get('query_cache_type'))
      .number('query_cache.size_bytes', variables.get('query_cache_size'))
      .number('query_cache.limit_bytes', variables.get('query_cache_limit'))
      .number('query_cache.hits', status.get('qcache_hits'))
      .number('query_cache.inserts', status.get('qcache_inserts'))
      .number('query_cache.not_cached', status.get('qcache_not_cached'))
      .number('query_cache.lowmem_prunes', status.get('qcache_lowmem_prunes'))
      .number('query_cache.free_memory_bytes', status.get('qcache_free_memory'))
      .number('query_cache.total_blocks', status.get('qcache_total_blocks'))
      .number('query_cache.free_blocks', status.get('qcache_free_blocks'))
      .number('query_cache.queries_in_cache', status.get('qcache_queries_in_cache'))
      .toArray();
  }
}
