/**
 * 报告落盘
 *
 * 按配置的格式依次导出同一份报告，文件名为 `<前缀>_<YYYYMMDD_HHMMSS>.<扩展名>`，
 * 时间戳取自报告的生成时间。同名文件已存在时追加 `_1`、`_2` 等序号，不覆盖已有报告。
 * 单个格式失败只记录错误，不影响其他格式。
 *
 * @fileoverview 多格式报告写入
 * @since 1.0.0
 */

import { ReportConfig } from '../config.js';
import { ExporterFactory } from '../exporter/exporterFactory.js';
import { ExportResult } from '../exporter/exporters.js';
import { logger } from '../logger.js';
import { Report } from '../types.js';
import { TimeUtils } from '../utils/common.js';
import { generateSafeFileName, listFileNames } from '../utils/fileUtils.js';

export class ReportWriter {
  constructor(
    private readonly config: Pick<ReportConfig, 'outputDir' | 'formats' | 'filePrefix'>,
    private readonly factory: ExporterFactory = ExporterFactory.getInstance()
  ) {}

  /**
   * 报告文件的基础名（不含扩展名）
   */
  public baseNameFor(report: Report): string {
    const prefix = generateSafeFileName(this.config.filePrefix) || 'report';
    return `${prefix}_${TimeUtils.formatFileTimestamp(report.generatedAt)}`;
  }

  /**
   * 输出目录中尚未被占用的基础名
   */
  public async availableBaseName(report: Report): Promise<string> {
    const baseName = this.baseNameFor(report);
    const existing = await listFileNames(this.config.outputDir);
    const taken = (candidate: string): boolean => existing.some(name => name.startsWith(`${candidate}.`));

    let candidate = baseName;
    for (let suffix = 1; taken(candidate); suffix++) {
      candidate = `${baseName}_${suffix}`;
    }
    return candidate;
  }

  public async write(report: Report): Promise<ExportResult[]> {
    const baseName = await this.availableBaseName(report);
    const results: ExportResult[] = [];

    for (const format of this.config.formats) {
      const exporter = this.factory.createExporter(format);
      const result = await exporter.export(report, { outputDir: this.config.outputDir, baseName });

      if (result.success) {
        logger.info('报告已写入', 'ReportWriter', {
          format,
          filePath: result.filePath,
          fileSize: result.fileSize
        });
      } else {
        logger.error('报告写入失败', 'ReportWriter', undefined, { format, filePath: result.filePath, reason: result.error });
      }
      results.push(result);
    }

    return results;
  }
}
