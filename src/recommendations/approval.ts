/**
 * 建议审批
 *
 * 带修正语句的建议以 pending 产生，只能由外部确认方（ApprovalGate）转为 approved 或 rejected。
 * 审批只改变状态，从不执行语句。确认方出错时建议保持 pending。
 *
 * @fileoverview 建议审批协议
 * @since 1.0.0
 */

import * as readline from 'readline/promises';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import {
  ApprovalDecision,
  ErrorCategory,
  ErrorSeverity,
  MonitorError,
  Recommendation
} from '../types.js';

/**
 * 外部确认方
 */
export interface ApprovalGate {
  review(recommendation: Recommendation): Promise<ApprovalDecision>;
}

/**
 * 审批状态转换：只允许 pending -> approved | rejected
 *
 * @throws {MonitorError} 建议不处于 pending 状态
 */
export function transitionApproval(recommendation: Recommendation, decision: ApprovalDecision): Recommendation {
  if (recommendation.approval !== 'pending') {
    throw new MonitorError(
      `建议 ${recommendation.id} 的审批状态为 ${recommendation.approval}，不能转为 ${decision}`,
      ErrorCategory.VALIDATION_ERROR,
      ErrorSeverity.LOW
    );
  }
  return { ...recommendation, approval: decision };
}

/**
 * 依次把 pending 建议交给确认方，返回新的建议列表
 */
export async function applyApprovals(
  recommendations: readonly Recommendation[],
  gate: ApprovalGate
): Promise<Recommendation[]> {
  const reviewed: Recommendation[] = [];

  for (const recommendation of recommendations) {
    if (recommendation.approval !== 'pending') {
      reviewed.push(recommendation);
      continue;
    }

    try {
      const decision = await gate.review(recommendation);
      reviewed.push(transitionApproval(recommendation, decision));
      logger.info('建议审批完成', 'Approval', { recommendation: recommendation.id, decision });
    } catch (error) {
      logger.warn('审批失败，建议保持 pending', 'Approval', {
        recommendation: recommendation.id,
        reason: ErrorHandler.messageOf(error)
      });
      reviewed.push(recommendation);
    }
  }

  return reviewed;
}

/**
 * 终端确认：逐条询问 y/N，默认拒绝
 *
 * @example
 * const gate = new ConsoleApprovalGate();
 * try {
 *   recommendations = await applyApprovals(recommendations, gate);
 * } finally {
 *   gate.close();
 * }
 */
export class ConsoleApprovalGate implements ApprovalGate {
  private readonly rl: readline.Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stderr
  ) {
    this.rl = readline.createInterface({ input, output, terminal: false });
  }

  public async review(recommendation: Recommendation): Promise<ApprovalDecision> {
    const answer = await this.rl.question(
      `\n[${recommendation.priority}] ${recommendation.advice}\n` +
      `  建议语句: ${recommendation.command ?? ''}\n` +
      '是否批准该语句？（仅记录审批结果，不会执行）[y/N] '
    );
    return ['y', 'yes'].includes(answer.trim().toLowerCase()) ? 'approved' : 'rejected';
  }

  public close(): void {
    this.rl.close();
  }
}
