import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { checkCommand } from '../../../src/cli/commands/check.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { captureConsole, diagnosticCodes, writeTempGraph } from '../../helpers/test-utils.js';

const ORIGINAL_VALIDATE = process.env.IR_WALKER_VALIDATE;

function graphJson(nodes: unknown): string {
  return JSON.stringify({ version: '1.0', graph: { nodes } });
}

describe('checkCommand', { concurrency: false }, () => {
  afterEach(() => {
    if (typeof ORIGINAL_VALIDATE === 'undefined') {
      delete process.env.IR_WALKER_VALIDATE;
    } else {
      process.env.IR_WALKER_VALIDATE = ORIGINAL_VALIDATE;
    }
    ConfigService.resetForTesting();
  });

  it('良构的图输出节点与块的数量', async () => {
    const file = writeTempGraph(
      graphJson([
        { kind: 'Plain', label: 'A' },
        { kind: 'Region', label: 'loop', blocks: [[{ kind: 'Plain', label: 'B' }]] },
      ])
    );
    const captured = captureConsole();
    try {
      await checkCommand(file.path);
    } finally {
      captured.restore();
      file.cleanup();
    }
    assert.equal(captured.stdout.length, 1);
    assert.ok(captured.stdout[0]?.endsWith(`${file.path}: 3 nodes, 2 blocks`));
  });

  it('加载时校验失败抛出 G005', async () => {
    const file = writeTempGraph(graphJson([{ kind: 'Conditional', label: 'c', blocks: [[]] }]));
    try {
      await assert.rejects(
        () => checkCommand(file.path),
        (error: unknown) => diagnosticCodes(error).join(',') === 'G005'
      );
    } finally {
      file.cleanup();
    }
  });

  it('关闭加载时校验后仍会完整检查', async () => {
    process.env.IR_WALKER_VALIDATE = '0';
    ConfigService.resetForTesting();
    const file = writeTempGraph(graphJson([{ kind: 'Region', label: 'r', blocks: [] }]));
    try {
      await assert.rejects(
        () => checkCommand(file.path),
        (error: unknown) => diagnosticCodes(error).join(',') === 'G005'
      );
    } finally {
      file.cleanup();
    }
  });

  it('schema 不符时抛出 J003', async () => {
    const file = writeTempGraph(graphJson([{ kind: 'Plain' }]));
    try {
      await assert.rejects(
        () => checkCommand(file.path),
        (error: unknown) => diagnosticCodes(error).join(',') === 'J003'
      );
    } finally {
      file.cleanup();
    }
  });
});
