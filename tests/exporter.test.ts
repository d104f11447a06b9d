/**
 * 报告导出测试
 *
 * @description 测试导出器工厂、各格式导出器的文件内容与事件，以及报告落盘的文件命名与失败隔离
 * @since 1.0.0
 */

import * as ExcelJS from 'exceljs';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ExporterFactory } from '../src/exporter/exporterFactory.js';
import { CsvExporter, ExportResult, JsonExporter, TextExporter } from '../src/exporter/exporters.js';
import { renderCsv, renderText, toRecords } from '../src/report/renderers.js';
import { ReportWriter } from '../src/report/reportWriter.js';
import { ErrorCategory, MonitorError, Report } from '../src/types.js';
import { ReportBuilder } from '../src/report/reportBuilder.js';
import {
  buildSampleReport,
  FINDING,
  GENERATED_AT,
  RECOMMENDATION,
  RESOLVED,
  SAMPLES
} from './helpers/reportFixture.js';

describe('ExporterFactory', () => {
  test('xlsx 是 excel 的别名，实例被缓存', () => {
    const factory = new ExporterFactory();

    expect(factory.createExporter('xlsx').format).toBe('excel');
    expect(factory.createExporter('csv')).toBe(factory.createExporter('csv'));
    expect(factory.supportedTypes()).toEqual(['text', 'csv', 'json', 'excel', 'xlsx']);
  });

  test('未注册的格式抛出配置错误', () => {
    const factory = new ExporterFactory();
    let caught: unknown;

    try {
      factory.createExporter('pdf');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MonitorError);
    expect(caught).toMatchObject({ category: ErrorCategory.CONFIGURATION_ERROR });
  });

  test('重新注册后不再返回旧的缓存实例', () => {
    const factory = new ExporterFactory();
    const before = factory.createExporter('text');

    factory.register('text', TextExporter);

    expect(factory.createExporter('text')).not.toBe(before);
  });
});

describe('导出器', () => {
  let tempDir: string;
  let report: Report;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'exporter-test-'));
    report = buildSampleReport();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('文本导出写入渲染结果并在需要时创建目录', async () => {
    const outputDir = path.join(tempDir, 'nested', 'reports');

    const result = await new TextExporter().export(report, { outputDir, baseName: 'health' });

    expect(result).toMatchObject({ success: true, format: 'text', filePath: path.join(outputDir, 'health.txt'), recordCount: 1 });
    expect(await fs.readFile(path.join(outputDir, 'health.txt'), 'utf8')).toBe(renderText(report));
  });

  test('CSV 导出按行写入，记录数不含列头', async () => {
    const result = await new CsvExporter().export(report, { outputDir: tempDir, baseName: 'health' });

    expect(result.recordCount).toBe(7);
    expect(result.fileSize).toBe(Buffer.byteLength(renderCsv(report), 'utf8'));
    expect(await fs.readFile(path.join(tempDir, 'health.csv'), 'utf8')).toBe(renderCsv(report));
  });

  test('多行建议原样写入 CSV，记录数等于记录条数', async () => {
    const multiline = new ReportBuilder(GENERATED_AT)
      .withConnection({ host: 'db.test', port: 3306, user: 'monitor' })
      .withChecks(RESOLVED)
      .withSamples(SAMPLES)
      .withFindings([FINDING])
      .withRecommendations([{ ...RECOMMENDATION, advice: 'step one\n\nstep two' }], 'enriched')
      .build();

    const result = await new CsvExporter().export(multiline, { outputDir: tempDir, baseName: 'multiline' });

    const written = await fs.readFile(path.join(tempDir, 'multiline.csv'), 'utf8');
    expect(written).toBe(renderCsv(multiline));
    expect(written).toContain('"step one\n\nstep two [connections.usage_percent#warning]"');
    expect(result.recordCount).toBe(toRecords(multiline).length);
  });

  test('Excel 导出每种记录一个工作表', async () => {
    const exporter = new ExporterFactory().createExporter('excel');

    const result = await exporter.export(report, { outputDir: tempDir, baseName: 'health' });

    expect(result.success).toBe(true);
    expect(result.recordCount).toBe(7);
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path.join(tempDir, 'health.xlsx'));
    expect(workbook.worksheets.map(sheet => sheet.name)).toEqual(['章节', '指标', '发现项', '建议']);
    const metrics = workbook.getWorksheet('指标');
    expect(metrics?.getRow(1).getCell(1).value).toBe('type');
    expect(metrics?.getRow(2).getCell(3).value).toBe('connections.threads_connected');
    expect(metrics?.rowCount).toBe(4);
  });

  test('写入失败返回失败结果并触发 export-error 事件', async () => {
    class BrokenJsonExporter extends JsonExporter {
      protected async performExport(): Promise<number> {
        throw new Error('disk full, password=test-secret');
      }
    }
    const exporter = new BrokenJsonExporter();
    const events: ExportResult[] = [];
    exporter.on('export-error', (result: ExportResult) => events.push(result));

    const result = await exporter.export(report, { outputDir: tempDir, baseName: 'health' });

    expect(result.success).toBe(false);
    expect(result.error).toBe('disk full, password=***');
    expect(events).toEqual([result]);
  });
});

describe('ReportWriter', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-writer-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('文件名由前缀与报告生成时间组成', () => {
    const writer = new ReportWriter({ outputDir: tempDir, formats: ['json'], filePrefix: 'nightly report' });

    expect(writer.baseNameFor(buildSampleReport())).toBe('nightly_report_20240305_070809');
  });

  test('前缀清理后为空时使用 report', () => {
    const writer = new ReportWriter({ outputDir: tempDir, formats: ['json'], filePrefix: '///' });

    expect(writer.baseNameFor(buildSampleReport())).toBe('report_20240305_070809');
  });

  test('按配置的格式依次写入同一份报告', async () => {
    const writer = new ReportWriter(
      { outputDir: tempDir, formats: ['text', 'json', 'csv'], filePrefix: 'health_report' },
      new ExporterFactory()
    );

    const results = await writer.write(buildSampleReport());

    expect(results.map(result => [result.format, result.success])).toEqual([
      ['text', true],
      ['json', true],
      ['csv', true]
    ]);
    expect((await fs.readdir(tempDir)).sort()).toEqual([
      'health_report_20240305_070809.csv',
      'health_report_20240305_070809.json',
      'health_report_20240305_070809.txt'
    ]);
  });

  test('同一秒生成的报告追加序号，不覆盖已有文件', async () => {
    const writer = new ReportWriter({ outputDir: tempDir, formats: ['text', 'json'], filePrefix: 'health_report' });
    const report = buildSampleReport();

    await writer.write(report);
    await writer.write(report);
    const third = await writer.write(report);

    expect(third.map(result => path.basename(result.filePath ?? ''))).toEqual([
      'health_report_20240305_070809_2.txt',
      'health_report_20240305_070809_2.json'
    ]);
    expect((await fs.readdir(tempDir)).sort()).toEqual([
      'health_report_20240305_070809.json',
      'health_report_20240305_070809.txt',
      'health_report_20240305_070809_1.json',
      'health_report_20240305_070809_1.txt',
      'health_report_20240305_070809_2.json',
      'health_report_20240305_070809_2.txt'
    ]);
  });

  test('输出目录尚不存在时使用原始基础名', async () => {
    const writer = new ReportWriter({ outputDir: path.join(tempDir, 'missing'), formats: ['json'], filePrefix: 'health_report' });

    expect(await writer.availableBaseName(buildSampleReport())).toBe('health_report_20240305_070809');
  });

  test('单个格式失败不影响其他格式', async () => {
    class BrokenTextExporter extends TextExporter {
      protected async performExport(): Promise<number> {
        throw new Error('read-only file system');
      }
    }
    const factory = new ExporterFactory();
    factory.register('text', BrokenTextExporter);
    const writer = new ReportWriter({ outputDir: tempDir, formats: ['text', 'json'], filePrefix: 'health_report' }, factory);

    const results = await writer.write(buildSampleReport());

    expect(results[0]).toMatchObject({ success: false, format: 'text', error: 'read-only file system' });
    expect(results[1]).toMatchObject({ success: true, format: 'json' });
    expect(await fs.readdir(tempDir)).toEqual(['health_report_20240305_070809.json']);
  });
});
