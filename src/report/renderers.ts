/**
 * 报告渲染
 *
 * 所有渲染函数只依赖 Report 值本身，不访问数据库也不重新分析，
 * 同一份报告在任何格式下的渲染结果都是确定的。
 *
 * @fileoverview 文本、JSON 与表格渲染
 * @since 1.0.0
 */

import { MetricValue, Report } from '../types.js';

/**
 * 表格模型中的一条记录，CSV 与 Excel 共用
 */
export interface ReportRecord {
  type: 'section' | 'metric' | 'finding' | 'recommendation';
  section: string;
  name: string;
  value: string;
  severity: string;
  status: string;
  detail: string;
}

export const RECORD_HEADERS: readonly (keyof ReportRecord)[] = [
  'type',
  'section',
  'name',
  'value',
  'severity',
  'status',
  'detail'
];

const APPROVAL_LABELS: Record<string, string> = {
  pending: '待审批',
  approved: '已批准',
  rejected: '已拒绝',
  'not-applicable': '无需审批'
};

/**
 * 格式化指标值：时长带 ms 单位，非整数保留两位小数
 */
export function formatMetricValue(value: MetricValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  const ms = value.milliseconds;
  return `${Number.isInteger(ms) ? ms : ms.toFixed(2)} ms`;
}

/**
 * 渲染纯文本报告
 */
export function renderText(report: Report): string {
  const lines: string[] = [];
  const { connection } = report;

  lines.push('MySQL 健康巡检报告');
  lines.push(`生成时间: ${report.generatedAt}`);
  lines.push(`连接: ${connection.user}@${connection.host}:${connection.port}`);
  lines.push(`巡检深度: ${report.levelName}`);
  lines.push(`检查项: ${report.checks.resolved.join(', ') || '（无）'}`);
  for (const skipped of report.checks.skipped) {
    lines.push(`已跳过: ${skipped.check}（${skipped.reason}）`);
  }
  lines.push(`状态: ${report.degraded ? '部分章节采集失败' : '正常'}`);

  for (const section of report.sections) {
    lines.push('');
    if (section.status === 'failed') {
      lines.push(`== ${section.title} [${section.collector}] == 采集失败`);
      lines.push(`  ! ${section.error?.category ?? 'unknown'}: ${section.error?.message ?? ''}`);
      continue;
    }
    lines.push(`== ${section.title} [${section.collector}] ==`);
    if (section.samples.length === 0) {
      lines.push('  （无数据）');
    }
    for (const sample of section.samples) {
      lines.push(`  ${sample.name} = ${formatMetricValue(sample.value)}${sample.derived ? ' (派生)' : ''}`);
    }
  }

  lines.push('');
  lines.push(`== 发现项 (${report.findings.length}) ==`);
  if (report.findings.length === 0) {
    lines.push('  未发现超过阈值的指标');
  }
  for (const finding of report.findings) {
    lines.push(`  [${finding.severity.toUpperCase()}] ${finding.metric}: ${finding.description}`);
  }

  lines.push('');
  lines.push(`== 优化建议 (${report.recommendations.length}) == 模式: ${report.recommendationMode}`);
  if (report.recommendationNotice) {
    lines.push(`  注意: ${report.recommendationNotice}`);
  }
  report.recommendations.forEach((recommendation, index) => {
    lines.push(`  ${index + 1}. [${recommendation.priority}] ${recommendation.advice}`);
    if (recommendation.command) {
      lines.push(`     语句: ${recommendation.command}（${APPROVAL_LABELS[recommendation.approval]}）`);
    }
    lines.push(`     依据: ${recommendation.findingIds.join(', ')}`);
  });

  return lines.join('\n') + '\n';
}

/**
 * 渲染 JSON 报告
 */
export function renderJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}

/**
 * 把报告展开为记录
 *
 * 顺序：章节状态、各章节指标、发现项、建议。
 */
export function toRecords(report: Report): ReportRecord[] {
  const records: ReportRecord[] = [];

  for (const section of report.sections) {
    records.push({
      type: 'section',
      section: section.collector,
      name: section.title,
      value: String(section.samples.length),
      severity: '',
      status: section.status,
      detail: section.error ? `${section.error.category}: ${section.error.message}` : ''
    });
  }

  for (const section of report.sections) {
    for (const sample of section.samples) {
      records.push({
        type: 'metric',
        section: section.collector,
        name: sample.name,
        value: formatMetricValue(sample.value),
        severity: '',
        status: sample.derived ? 'derived' : 'raw',
        detail: sample.capturedAt
      });
    }
  }

  for (const finding of report.findings) {
    records.push({
      type: 'finding',
      section: finding.collector,
      name: finding.metric,
      value: formatMetricValue(finding.value),
      severity: finding.severity,
      status: finding.threshold,
      detail: finding.description
    });
  }

  for (const recommendation of report.recommendations) {
    records.push({
      type: 'recommendation',
      section: recommendation.subsystem,
      name: recommendation.id,
      value: recommendation.command ?? '',
      severity: recommendation.priority,
      status: recommendation.approval,
      detail: `${recommendation.advice} [${recommendation.findingIds.join(' ')}]`
    });
  }

  return records;
}

/**
 * 格式化 CSV 单元格：含逗号、引号或换行时加引号，内部引号加倍
 */
export function formatCSVValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * 渲染记录式 CSV
 */
/**
 * 单条记录的 CSV 行（不含换行符）
 */
export function formatCSVRecord(record: ReportRecord): string {
  return RECORD_HEADERS.map(header => formatCSVValue(record[header])).join(',');
}

export function renderCsv(report: Report): string {
  const lines = [RECORD_HEADERS.join(',')];
  for (const record of toRecords(report)) {
    lines.push(formatCSVRecord(record));
  }
  return lines.join('\n') + '\n';
}
