/**
 * 导出器工厂
 *
 * @since 1.0.0
 * @version 1.0.0
 */

import {
  ExporterType,
  ExporterConstructor,
  BaseExporter,
  TextExporter,
  CsvExporter,
  JsonExporter,
  ExcelExporter
} from './exporters.js';
import { MonitorError, ErrorCategory, ErrorSeverity } from '../types.js';
import { ErrorHandler } from '../errorHandler.js';

/**
 * 导出器工厂类
 *
 * 主要功能：
 * - 1. 单例模式管理
 * - 2. 导出器实例创建与缓存
 * - 3. 自定义格式注册
 */
export class ExporterFactory {
  private static instance: ExporterFactory | null = null;

  /* 导出器类型注册表 */
  private readonly exporterRegistry = new Map<string, ExporterConstructor>();

  /* 导出器实例缓存 */
  private readonly exporterCache = new Map<string, BaseExporter>();

  constructor() {
    this.initializeDefaultExporters();
  }

  /**
   * 获取工厂实例 - 单例模式
   */
  public static getInstance(): ExporterFactory {
    if (!ExporterFactory.instance) {
      ExporterFactory.instance = new ExporterFactory();
    }
    return ExporterFactory.instance;
  }

  private initializeDefaultExporters(): void {
    this.exporterRegistry.set('text', TextExporter);
    this.exporterRegistry.set('csv', CsvExporter);
    this.exporterRegistry.set('json', JsonExporter);
    this.exporterRegistry.set('excel', ExcelExporter);
    this.exporterRegistry.set('xlsx', ExcelExporter); // xlsx 是 excel 的别名
  }

  /**
   * 注册或替换某个格式的导出器
   */
  public register(type: string, exporter: ExporterConstructor): void {
    this.exporterRegistry.set(type, exporter);
    this.exporterCache.delete(type);
  }

  public supportedTypes(): string[] {
    return Array.from(this.exporterRegistry.keys());
  }

  /**
   * 创建导出器实例
   *
   * @throws {MonitorError} 格式未注册或构造失败
   */
  public createExporter(type: ExporterType | string = 'json'): BaseExporter {
    const cached = this.exporterCache.get(type);
    if (cached) {
      return cached;
    }

    const ExporterClass = this.exporterRegistry.get(type);

    if (!ExporterClass) {
      throw new MonitorError(
        `不支持的导出器类型: ${type}。支持的类型: ${this.supportedTypes().join(', ')}`,
        ErrorCategory.CONFIGURATION_ERROR,
        ErrorSeverity.MEDIUM
      );
    }

    try {
      const exporter = new ExporterClass();

      // 缓存实例（限制缓存大小）
      if (this.exporterCache.size < 10) {
        this.exporterCache.set(type, exporter);
      }

      return exporter;
    } catch (error) {
      throw new MonitorError(
        `创建导出器失败 (${type}): ${ErrorHandler.messageOf(error)}`,
        ErrorCategory.CONFIGURATION_ERROR,
        ErrorSeverity.HIGH,
        error instanceof Error ? error : undefined
      );
    }
  }
}
