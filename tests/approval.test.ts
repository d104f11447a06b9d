/**
 * 建议审批测试
 *
 * @description 测试审批状态转换、确认方出错时保持 pending 以及终端确认
 * @since 1.0.0
 */

import { PassThrough } from 'stream';
import {
  ApprovalGate,
  applyApprovals,
  ConsoleApprovalGate,
  transitionApproval
} from '../src/recommendations/approval.js';
import { ApprovalDecision, ErrorCategory, MonitorError, Recommendation } from '../src/types.js';

function recommendation(id: string, command?: string): Recommendation {
  return {
    id,
    findingIds: [`${id}#warning`],
    subsystem: 'connections',
    advice: '适当提高 max_connections',
    ...(command !== undefined ? { command } : {}),
    priority: 'medium',
    source: 'local',
    approval: command !== undefined ? 'pending' : 'not-applicable'
  };
}

describe('transitionApproval', () => {
  test('pending 可以转为 approved 或 rejected，原对象不变', () => {
    const pending = recommendation('local-1', 'SET GLOBAL max_connections = 125');

    expect(transitionApproval(pending, 'approved').approval).toBe('approved');
    expect(transitionApproval(pending, 'rejected').approval).toBe('rejected');
    expect(pending.approval).toBe('pending');
  });

  test('非 pending 状态不能转换', () => {
    const approved = transitionApproval(recommendation('local-1', 'SELECT 1'), 'approved');

    expect(() => transitionApproval(approved, 'rejected')).toThrow(MonitorError);
    expect(() => transitionApproval(recommendation('local-2'), 'approved')).toThrow(
      '建议 local-2 的审批状态为 not-applicable，不能转为 approved'
    );
  });
});

describe('applyApprovals', () => {
  test('只把 pending 建议交给确认方，确认方出错时保持 pending', async () => {
    const review = jest.fn<Promise<ApprovalDecision>, [Recommendation]>()
      .mockResolvedValueOnce('approved')
      .mockRejectedValueOnce(new Error('stdin closed'));
    const gate: ApprovalGate = { review };
    const input = [
      recommendation('local-1', 'SET GLOBAL max_connections = 125'),
      recommendation('local-2'),
      recommendation('local-3', 'FLUSH QUERY CACHE')
    ];

    const reviewed = await applyApprovals(input, gate);

    expect(review).toHaveBeenCalledTimes(2);
    expect(reviewed.map(item => [item.id, item.approval])).toEqual([
      ['local-1', 'approved'],
      ['local-2', 'not-applicable'],
      ['local-3', 'pending']
    ]);
  });

  test('确认方返回的状态变更错误也保持 pending', async () => {
    const gate: ApprovalGate = {
      review: () => Promise.reject(new MonitorError('拒绝访问', ErrorCategory.VALIDATION_ERROR))
    };

    const [reviewed] = await applyApprovals([recommendation('local-1', 'SELECT 1')], gate);

    expect(reviewed.approval).toBe('pending');
  });
});

describe('ConsoleApprovalGate', () => {
  let input: PassThrough;
  let output: PassThrough;
  let prompt: string;
  let gate: ConsoleApprovalGate;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    prompt = '';
    output.on('data', (chunk: Buffer) => {
      prompt += chunk.toString('utf8');
    });
    gate = new ConsoleApprovalGate(input, output);
  });

  afterEach(() => {
    gate.close();
  });

  test('回答 y 时批准，提示中包含语句', async () => {
    const pending = gate.review(recommendation('local-1', 'SET GLOBAL max_connections = 125'));
    input.write('Y\n');

    await expect(pending).resolves.toBe('approved');
    expect(prompt).toContain('建议语句: SET GLOBAL max_connections = 125');
    expect(prompt).toContain('[medium] 适当提高 max_connections');
  });

  test.each(['n\n', '\n', 'maybe\n'])('回答 %j 时拒绝', async answer => {
    const pending = gate.review(recommendation('local-1', 'SELECT 1'));
    input.write(answer);

    await expect(pending).resolves.toBe('rejected');
  });
});
