/**
 * 统一类型定义
 *
 * @fileoverview 错误类型与巡检领域类型的统一出口
 * @since 1.0.0
 * @license MIT
 */

export * from './types/errorTypes.js';

export * from './types/monitorTypes.js';
