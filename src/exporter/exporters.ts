/**
 * 报告导出器
 *
 * 把一份 Report 写入文本、JSON、CSV 或 Excel 文件。导出内容全部来自渲染函数，
 * 导出器只负责文件 IO，失败时返回 success: false 而不抛出。
 *
 * @fileoverview 报告导出器，支持 text、JSON、CSV、Excel
 * @since 1.0.0
 * @version 1.0.0
 */

import { promises as fs, createWriteStream, WriteStream } from 'fs';
import path from 'path';
import * as ExcelJS from 'exceljs';
import { EventEmitter } from 'events';
import { Report, ReportFormat } from '../types.js';
import { ensureDirectoryExists } from '../utils/fileUtils.js';
import { ErrorHandler } from '../errorHandler.js';
import {
  formatCSVRecord,
  RECORD_HEADERS,
  ReportRecord,
  renderJson,
  renderText,
  toRecords
} from '../report/renderers.js';

/**
 * 支持的导出格式类型，xlsx 是 excel 的别名
 */
export type ExporterType = ReportFormat | 'xlsx';

/**
 * 导出选项
 */
export interface ExportOptions {
  /** 输出目录 */
  outputDir: string;
  /** 不含扩展名的文件名 */
  baseName: string;
}

/**
 * 导出结果接口
 */
export interface ExportResult {
  success: boolean;
  format: string;
  filePath?: string;
  fileSize?: number;
  /** 写入的记录数（文本与 JSON 为 1） */
  recordCount?: number;
  duration: number;
  error?: string;
}

/**
 * 导出器构造函数类型
 */
export type ExporterConstructor = new () => BaseExporter;

/**
 * 基础导出器抽象类
 *
 * 统一导出流程：确保目录、生成路径、执行写入、统计文件大小，
 * 并通过事件通知开始、完成与失败。
 */
export abstract class BaseExporter extends EventEmitter {
  /**
   * 格式名称 - 由子类实现
   */
  public abstract readonly format: ReportFormat;

  /**
   * 获取文件扩展名 - 由子类实现
   */
  protected abstract getFileExtension(): string;

  /**
   * 执行具体的写入操作，返回写入的记录数 - 由子类实现
   */
  protected abstract performExport(report: Report, outputPath: string): Promise<number>;

  /**
   * 主导出方法
   */
  async export(report: Report, options: ExportOptions): Promise<ExportResult> {
    const startTime = Date.now();
    const outputPath = path.join(options.outputDir, `${options.baseName}.${this.getFileExtension()}`);

    try {
      await ensureDirectoryExists(options.outputDir);
      this.emit('export-start', { format: this.format, outputPath });

      const recordCount = await this.performExport(report, outputPath);
      const stats = await fs.stat(outputPath);

      const result: ExportResult = {
        success: true,
        format: this.format,
        filePath: outputPath,
        fileSize: stats.size,
        recordCount,
        duration: Date.now() - startTime
      };

      this.emit('export-complete', result);
      return result;
    } catch (error) {
      const result: ExportResult = {
        success: false,
        format: this.format,
        filePath: outputPath,
        error: ErrorHandler.messageOf(error),
        duration: Date.now() - startTime
      };

      this.emit('export-error', result);
      return result;
    }
  }

  /**
   * 创建输出流
   */
  protected createOutputStream(filePath: string): WriteStream {
    return createWriteStream(filePath, { encoding: 'utf8' });
  }

  /**
   * 写入流数据
   */
  protected writeToStream(stream: WriteStream, data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      if (!stream.write(data)) {
        stream.once('drain', () => {
          stream.off('error', reject);
          resolve();
        });
      } else {
        stream.off('error', reject);
        resolve();
      }
    });
  }

  /**
   * 关闭流
   */
  protected closeStream(stream: WriteStream): Promise<void> {
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }
}

/**
 * 纯文本导出器
 */
export class TextExporter extends BaseExporter {
  public readonly format = 'text' as const;

  protected getFileExtension(): string {
    return 'txt';
  }

  protected async performExport(report: Report, outputPath: string): Promise<number> {
    await fs.writeFile(outputPath, renderText(report), 'utf8');
    return 1;
  }
}

/**
 * JSON 导出器
 */
export class JsonExporter extends BaseExporter {
  public readonly format = 'json' as const;

  protected getFileExtension(): string {
    return 'json';
  }

  protected async performExport(report: Report, outputPath: string): Promise<number> {
    await fs.writeFile(outputPath, renderJson(report), 'utf8');
    return 1;
  }
}

/**
 * CSV 导出器
 *
 * 按行流式写入记录式 CSV，首行为列头。
 */
export class CsvExporter extends BaseExporter {
  public readonly format = 'csv' as const;

  protected getFileExtension(): string {
    return 'csv';
  }

  protected async performExport(report: Report, outputPath: string): Promise<number> {
    const stream = this.createOutputStream(outputPath);
    const records = toRecords(report);

    try {
      await this.writeToStream(stream, RECORD_HEADERS.join(',') + '\n');
      for (const record of records) {
        await this.writeToStream(stream, formatCSVRecord(record) + '\n');
      }
    } finally {
      await this.closeStream(stream);
    }

    return records.length;
  }
}

const SHEETS: ReadonlyArray<[ReportRecord['type'], string]> = [
  ['section', '章节'],
  ['metric', '指标'],
  ['finding', '发现项'],
  ['recommendation', '建议']
];

/**
 * Excel 导出器
 *
 * 每种记录类型一个工作表，列头与 CSV 相同。
 */
export class ExcelExporter extends BaseExporter {
  public readonly format = 'excel' as const;

  protected getFileExtension(): string {
    return 'xlsx';
  }

  protected async performExport(report: Report, outputPath: string): Promise<number> {
    const workbook = new ExcelJS.Workbook();
    workbook.created = new Date(report.generatedAt);
    const records = toRecords(report);

    for (const [type, title] of SHEETS) {
      const rows = records.filter(record => record.type === type);
      const worksheet = workbook.addWorksheet(title);

      worksheet.columns = RECORD_HEADERS.map(header => ({
        header,
        key: header,
        width: this.calculateColumnWidth(header, rows.slice(0, 100))
      }));
      this.styleHeader(worksheet);
      worksheet.addRows(rows);
      this.applyStyles(worksheet);
    }

    await workbook.xlsx.writeFile(outputPath);
    return records.length;
  }

  /**
   * 计算列宽：限制在 10 到 50 之间
   */
  private calculateColumnWidth(column: keyof ReportRecord, sampleRows: ReportRecord[]): number {
    const maxLength = sampleRows.reduce((max, row) => Math.max(max, row[column].length), column.length);
    return Math.min(50, Math.max(10, maxLength + 2));
  }

  /**
   * 样式化表头
   */
  private styleHeader(worksheet: ExcelJS.Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
      bold: true,
      color: { argb: 'FFFFFFFF' }
    };

    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
      vertical: 'middle',
      horizontal: 'center'
    };

    headerRow.height = 25;
  }

  /**
   * 应用表格样式：边框、隔行着色、冻结首行与自动筛选
   */
  private applyStyles(worksheet: ExcelJS.Worksheet): void {
    worksheet.eachRow((row, rowNumber) => {
      row.eachCell(cell => {
        cell.border = {
          top: { style: 'thin' },
          left: { style: 'thin' },
          bottom: { style: 'thin' },
          right: { style: 'thin' }
        };
      });

      if (rowNumber > 1 && rowNumber % 2 === 0) {
        row.fill = {
          type: 'pattern',
          pattern: 'solid',
          fgColor: { argb: 'FFF2F2F2' }
        };
      }
    });

    worksheet.views = [{
      state: 'frozen',
      xSplit: 0,
      ySplit: 1
    }];

    if (worksheet.rowCount > 1) {
      worksheet.autoFilter = {
        from: { row: 1, column: 1 },
        to: { row: 1, column: worksheet.columnCount }
      };
    }
  }
}
