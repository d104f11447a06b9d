/**
 * 外部推理服务客户端
 *
 * 通过 Anthropic Messages API 请求增强建议。请求体有大小上限，调用受超时约束，
 * 响应用 zod 校验；任何失败都以 RecommendationServiceError 抛出，由建议流水线回退到本地规则。
 *
 * @fileoverview 推理服务客户端
 * @since 1.0.0
 */

import { z } from 'zod';
import { ReasoningConfig } from '../config.js';
import { DefaultConfig, StringConstants } from '../constants.js';
import { logger } from '../logger.js';
import {
  ErrorCategory,
  Finding,
  MetricSample,
  RecommendationServiceError
} from '../types.js';

/**
 * 发给推理服务的请求
 */
export interface ReasoningRequest {
  readonly level: string;
  readonly findings: readonly Finding[];
  readonly samples: ReadonlyArray<{ name: string; value: number | string; collector: string }>;
}

/**
 * 推理服务返回的单条建议
 */
export const ReasoningAdviceSchema = z.object({
  advice: z.string().min(1),
  priority: z.enum(['high', 'medium', 'low']),
  findingIds: z.array(z.string()).min(1),
  command: z.string().min(1).optional(),
  subsystem: z.string().optional()
});

export const ReasoningResponseSchema = z.object({
  recommendations: z.array(ReasoningAdviceSchema)
});

export type ReasoningAdvice = z.infer<typeof ReasoningAdviceSchema>;

/**
 * 推理服务能力
 */
export interface ReasoningClient {
  advise(request: ReasoningRequest): Promise<ReasoningAdvice[]>;
}

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }))
});

const SYSTEM_PROMPT = [
  '你是 MySQL 数据库运维专家。输入是一次健康巡检的发现项与相关指标。',
  '只输出一个 JSON 对象，格式为 {"recommendations":[{"advice":string,"priority":"high"|"medium"|"low",',
  '"findingIds":string[],"command"?:string,"subsystem"?:string}]}。',
  'findingIds 只能引用输入中的发现项 id；command 只在确有必要时给出单条 SQL 语句，它不会被自动执行。'
].join('');

/**
 * 把巡检结果裁剪为不超过 maxBytes 的请求
 *
 * 先限制条数，再逐步丢弃排在后面的样本与发现项，直到序列化结果满足上限。
 */
export function buildReasoningRequest(
  level: string,
  findings: readonly Finding[],
  samples: readonly MetricSample[],
  maxBytes: number
): ReasoningRequest {
  const related = new Set(findings.map(finding => finding.collector));
  let selectedFindings = findings.slice(0, DefaultConfig.REASONING_MAX_FINDINGS);
  let selectedSamples = samples
    .filter(sample => related.has(sample.collector))
    .slice(0, DefaultConfig.REASONING_MAX_SAMPLES)
    .map(sample => ({
      name: sample.name,
      value: typeof sample.value === 'object' ? sample.value.milliseconds : sample.value,
      collector: sample.collector
    }));

  const size = (): number =>
    Buffer.byteLength(JSON.stringify({ level, findings: selectedFindings, samples: selectedSamples }), 'utf8');

  while (size() > maxBytes && selectedSamples.length > 0) {
    selectedSamples = selectedSamples.slice(0, Math.floor(selectedSamples.length / 2));
  }
  while (size() > maxBytes && selectedFindings.length > 1) {
    selectedFindings = selectedFindings.slice(0, selectedFindings.length - 1);
  }

  return { level, findings: selectedFindings, samples: selectedSamples };
}

/**
 * 从模型输出的文本中取出 JSON 对象
 */
export function extractJson(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new RecommendationServiceError(StringConstants.MSG_REASONING_INVALID_RESPONSE, ErrorCategory.INVALID_RESPONSE);
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new RecommendationServiceError(
      StringConstants.MSG_REASONING_INVALID_RESPONSE,
      ErrorCategory.INVALID_RESPONSE,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Anthropic Messages API 客户端
 *
 * @class AnthropicReasoningClient
 * @since 1.0.0
 */
export class AnthropicReasoningClient implements ReasoningClient {
  constructor(
    private readonly config: ReasoningConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  public async advise(request: ReasoningRequest): Promise<ReasoningAdvice[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/v1/messages`;
    const startTime = Date.now();

    // 超时同时覆盖请求与响应体读取
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let payload: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          'x-api-key': this.config.apiKey,
          'anthropic-version': StringConstants.REASONING_API_VERSION
        },
        body: JSON.stringify({
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: JSON.stringify(request) }]
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new RecommendationServiceError(
          `${StringConstants.MSG_REASONING_FAILED}: HTTP ${response.status} ${body.slice(0, DefaultConfig.MAX_LOG_DETAIL_LENGTH)}`
        );
      }

      payload = await response.json();
    } catch (error) {
      if (error instanceof RecommendationServiceError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RecommendationServiceError(
          `${StringConstants.MSG_REASONING_TIMEOUT}（${this.config.timeout}ms）`,
          ErrorCategory.TIMEOUT_ERROR,
          error
        );
      }
      throw new RecommendationServiceError(
        `${StringConstants.MSG_REASONING_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCategory.EXTERNAL_SERVICE_ERROR,
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timeoutId);
    }

    const message = MessagesResponseSchema.safeParse(payload);
    if (!message.success) {
      throw new RecommendationServiceError(StringConstants.MSG_REASONING_INVALID_RESPONSE, ErrorCategory.INVALID_RESPONSE);
    }

    const text = message.data.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('');
    const parsed = ReasoningResponseSchema.safeParse(extractJson(text));
    if (!parsed.success) {
      throw new RecommendationServiceError(
        `${StringConstants.MSG_REASONING_INVALID_RESPONSE}: ${parsed.error.issues[0]?.message ?? ''}`,
        ErrorCategory.INVALID_RESPONSE
      );
    }

    logger.debug('推理服务返回建议', 'AnthropicReasoningClient', {
      items: parsed.data.recommendations.length,
      durationMs: Date.now() - startTime
    });

    return parsed.data.recommendations;
  }
}
