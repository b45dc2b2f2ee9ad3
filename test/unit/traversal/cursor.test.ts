import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { DepthFirstCursor, EXHAUSTED } from '../../../src/traversal/cursor.js';
import { buildGraph } from '../../../src/ir/builder.js';
import { Graph } from '../../../src/ir/graph.js';
import { Ir } from '../../../src/ir/ir.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { TraversalInvariantError } from '../../../src/diagnostics/diagnostics.js';
import type { IrTreeNode } from '../../../src/types.js';
import { drain, labelsOf } from '../../helpers/test-factories.js';

const { plain, conditional, region } = Ir;

function invariantCode(code: string): (error: unknown) => boolean {
  return (error: unknown) => error instanceof TraversalInvariantError && error.diagnostic.code === code;
}

describe('DepthFirstCursor', () => {
  describe('基本场景', () => {
    it('空图第一次调用即返回 EXHAUSTED', () => {
      const cursor = new DepthFirstCursor(buildGraph([]));
      assert.equal(cursor.exhausted, true);
      assert.equal(cursor.next(), EXHAUSTED);
    });

    it('根块中的普通节点按顺序返回', () => {
      const graph = buildGraph([plain('A'), plain('B'), plain('C')]);
      assert.deepEqual(labelsOf(graph), ['A', 'B', 'C']);
    });

    it('Conditional 先访问 then 再访问 else，然后回到兄弟节点', () => {
      const graph = buildGraph([plain('A'), conditional('Cond', [plain('B')], [plain('C')]), plain('D')]);
      assert.deepEqual(labelsOf(graph), ['A', 'Cond', 'B', 'C', 'D']);
    });

    it('跳过空的 then 块', () => {
      const graph = buildGraph([plain('A'), conditional('Cond', [], [plain('C')]), plain('D')]);
      assert.deepEqual(labelsOf(graph), ['A', 'Cond', 'C', 'D']);
    });

    it('跳过空的 else 块', () => {
      const graph = buildGraph([plain('A'), conditional('Cond', [plain('B')], []), plain('D')]);
      assert.deepEqual(labelsOf(graph), ['A', 'Cond', 'B', 'D']);
    });

    it('两个分支都为空时直接移到下一个兄弟', () => {
      const graph = buildGraph([plain('A'), conditional('Cond', [], []), plain('D')]);
      assert.deepEqual(labelsOf(graph), ['A', 'Cond', 'D']);
    });

    it('嵌套 Region 逐层上溯两级', () => {
      const graph = buildGraph([
        plain('A'),
        region('R1', [plain('B'), region('R2', [plain('C')])]),
        plain('D'),
      ]);
      assert.deepEqual(labelsOf(graph), ['A', 'R1', 'B', 'R2', 'C', 'D']);
    });

    it('空的 Region 体不会使游标停滞', () => {
      const graph = buildGraph([plain('A'), region('R', []), plain('D')]);
      assert.deepEqual(labelsOf(graph), ['A', 'R', 'D']);
    });

    it('图以控制节点结尾时上溯到根块后结束', () => {
      const graph = buildGraph([plain('A'), region('R', [conditional('If', [plain('x')], [plain('y')])])]);
      assert.deepEqual(labelsOf(graph), ['A', 'R', 'If', 'x', 'y']);
    });
  });

  describe('非根块中的兄弟节点', () => {
    it('嵌套的空 Region 之后继续访问同一块中的兄弟', () => {
      const graph = buildGraph([region('R1', [region('R2', []), plain('B')]), plain('C')]);
      assert.deepEqual(labelsOf(graph), ['R1', 'R2', 'B', 'C']);
    });

    it('嵌套的空 Conditional 之后继续访问同一块中的兄弟', () => {
      const graph = buildGraph([region('R', [conditional('If', [], []), plain('B')]), plain('C')]);
      assert.deepEqual(labelsOf(graph), ['R', 'If', 'B', 'C']);
    });

    it('内层块结束后回到外层块中的下一个兄弟', () => {
      const graph = buildGraph([region('R1', [region('R2', [plain('C')]), plain('D')]), plain('E')]);
      assert.deepEqual(labelsOf(graph), ['R1', 'R2', 'C', 'D', 'E']);
    });

    it('then 分支中的嵌套块结束后进入 else 分支', () => {
      const graph = buildGraph([
        conditional(
          'outer',
          [conditional('inner', [plain('a')], [plain('b')])],
          [region('loop', [plain('c')])]
        ),
        plain('end'),
      ]);
      assert.deepEqual(labelsOf(graph), ['outer', 'inner', 'a', 'b', 'loop', 'c', 'end']);
    });
  });

  describe('终止状态', () => {
    it('耗尽后重复调用始终返回 EXHAUSTED', () => {
      const cursor = new DepthFirstCursor(buildGraph([plain('A')]));
      assert.equal(cursor.exhausted, false);
      const first = cursor.next();
      assert.notEqual(first, EXHAUSTED);
      assert.equal(cursor.exhausted, true);
      for (let i = 0; i < 3; i++) {
        assert.equal(cursor.next(), EXHAUSTED);
      }
    });

    it('返回的是图中的节点记录', () => {
      const graph = buildGraph([plain('A'), region('R', [plain('B')])]);
      const nodes = drain(new DepthFirstCursor(graph));
      assert.deepEqual(
        nodes.map(n => n.id),
        [0, 1, 2]
      );
      assert.equal(nodes[2], graph.node(2));
    });

    it('同一张图上的多个游标互不影响', () => {
      const graph = buildGraph([plain('A'), region('R', [plain('B')]), plain('C')]);
      const left = new DepthFirstCursor(graph);
      const right = new DepthFirstCursor(graph);
      const seen: string[] = [];
      for (let i = 0; i < 4; i++) {
        const l = left.next();
        const r = right.next();
        assert.equal(l, r);
        if (l !== EXHAUSTED) seen.push(l.label);
      }
      assert.deepEqual(seen, ['A', 'R', 'B', 'C']);
      assert.equal(left.next(), EXHAUSTED);
      assert.equal(right.next(), EXHAUSTED);
    });
  });

  describe('深层嵌套', () => {
    it('数千层嵌套不会耗尽调用栈', () => {
      const depth = 5000;
      let body: IrTreeNode[] = [plain('leaf')];
      for (let i = depth - 1; i >= 0; i--) {
        body = i % 2 === 0 ? [region(`r${i}`, body)] : [conditional(`c${i}`, body, [])];
      }
      const graph = buildGraph([...body, plain('tail')]);

      const labels = labelsOf(graph);
      assert.equal(labels.length, depth + 2);
      assert.equal(labels[0], 'r0');
      assert.equal(labels[depth], 'leaf');
      assert.equal(labels[depth + 1], 'tail');
    });
  });

  describe('不变量破坏', () => {
    it('拥有子块的 Plain 节点报告 T001', () => {
      const graph = Graph.fromArena({
        root: 0,
        nodes: [
          { id: 0, kind: 'Plain', label: 'p', owningBlock: 0, blocks: [1] },
          { id: 1, kind: 'Plain', label: 'x', owningBlock: 1, blocks: [] },
        ],
        blocks: [
          { id: 0, owningNode: null, nodes: [0] },
          { id: 1, owningNode: 0, nodes: [1] },
        ],
      });
      const cursor = new DepthFirstCursor(graph);
      assert.notEqual(cursor.next(), EXHAUSTED);
      assert.throws(() => cursor.next(), invariantCode('T001'));
    });

    it('节点不在其所属块中时报告 T002', () => {
      const graph = Graph.fromArena({
        root: 0,
        nodes: [
          { id: 0, kind: 'Region', label: 'r', owningBlock: 0, blocks: [1] },
          { id: 1, kind: 'Plain', label: 'x', owningBlock: 0, blocks: [] },
        ],
        blocks: [
          { id: 0, owningNode: null, nodes: [0] },
          { id: 1, owningNode: 0, nodes: [1] },
        ],
      });
      const cursor = new DepthFirstCursor(graph);
      cursor.next();
      assert.throws(() => cursor.next(), invariantCode('T002'));
    });

    it('拥有者不认领该块时报告 T003', () => {
      const graph = Graph.fromArena({
        root: 0,
        nodes: [
          { id: 0, kind: 'Region', label: 'r', owningBlock: 0, blocks: [1] },
          { id: 1, kind: 'Plain', label: 'x', owningBlock: 1, blocks: [] },
          { id: 2, kind: 'Region', label: 'other', owningBlock: 0, blocks: [] },
        ],
        blocks: [
          { id: 0, owningNode: null, nodes: [0, 2] },
          { id: 1, owningNode: 2, nodes: [1] },
        ],
      });
      const cursor = new DepthFirstCursor(graph);
      cursor.next();
      assert.throws(() => cursor.next(), invariantCode('T003'));
    });

    it('引用不存在的块时报告 T004', () => {
      const graph = Graph.fromArena({
        root: 0,
        nodes: [{ id: 0, kind: 'Region', label: 'r', owningBlock: 0, blocks: [7] }],
        blocks: [{ id: 0, owningNode: null, nodes: [0] }],
      });
      const cursor = new DepthFirstCursor(graph);
      assert.throws(() => cursor.next(), invariantCode('T004'));
    });

    it('所属块没有拥有者且不是根块时报告 T006', () => {
      const graph = Graph.fromArena({
        root: 0,
        nodes: [
          { id: 0, kind: 'Plain', label: 'a', owningBlock: 1, blocks: [] },
          { id: 1, kind: 'Plain', label: 'b', owningBlock: 0, blocks: [] },
        ],
        blocks: [
          { id: 0, owningNode: null, nodes: [0, 1] },
          { id: 1, owningNode: null, nodes: [0] },
        ],
      });
      // 越过 a 时即发现所属块 1 脱离了根块，b 不会被静默跳过
      const cursor = new DepthFirstCursor(graph);
      assert.throws(
        () => cursor.next(),
        (error: unknown) =>
          error instanceof TraversalInvariantError &&
          error.diagnostic.code === 'T006' &&
          error.diagnostic.location.node === 0 &&
          error.diagnostic.location.block === 1
      );
    });

    it('遍历期间块被截短时报告 T005', () => {
      const rootNodes = [0, 1];
      const graph = Graph.fromArena({
        root: 0,
        nodes: [
          { id: 0, kind: 'Plain', label: 'a', owningBlock: 0, blocks: [] },
          { id: 1, kind: 'Plain', label: 'b', owningBlock: 0, blocks: [] },
        ],
        blocks: [{ id: 0, owningNode: null, nodes: rootNodes }],
      });
      const cursor = new DepthFirstCursor(graph);
      cursor.next();
      rootNodes.pop();
      assert.throws(() => cursor.next(), invariantCode('T005'));
    });
  });

  describe('遍历轨迹', { concurrency: false }, () => {
    const ENV_KEYS = ['IR_WALKER_TRACE', 'LOG_LEVEL'];
    const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
      ENV_KEYS.map(key => [key, process.env[key]])
    );
    let originalError: typeof console.error;
    let lines: string[];

    function restoreEnv(): void {
      for (const key of ENV_KEYS) {
        const value = ORIGINAL_ENV[key];
        if (typeof value === 'undefined') {
          delete process.env[key];
        } else {
          process.env[key] = value;
        }
      }
    }

    beforeEach(() => {
      lines = [];
      originalError = console.error;
      console.error = (message?: unknown) => {
        lines.push(String(message ?? ''));
      };
    });

    afterEach(() => {
      console.error = originalError;
      restoreEnv();
      ConfigService.resetForTesting();
    });

    it('IR_WALKER_TRACE=1 时以 DEBUG 记录下降与上溯', () => {
      process.env.IR_WALKER_TRACE = '1';
      process.env.LOG_LEVEL = 'debug';
      ConfigService.resetForTesting();

      const graph = buildGraph([plain('A'), conditional('Cond', [plain('B')], [plain('C')]), plain('D')]);
      drain(new DepthFirstCursor(graph));

      const entries = lines.map((line): { component: string; level: string; message: string } => JSON.parse(line));
      const trace = entries.filter(e => e.component === 'traversal');
      assert.deepEqual(
        trace.map(e => e.message),
        ['descend', 'descend', 'climb', 'exhausted']
      );
      assert.ok(trace.every(e => e.level === 'DEBUG'));
    });

    it('默认不输出轨迹', () => {
      delete process.env.IR_WALKER_TRACE;
      process.env.LOG_LEVEL = 'debug';
      ConfigService.resetForTesting();

      drain(new DepthFirstCursor(buildGraph([region('R', [plain('x')])])));
      assert.deepEqual(lines, []);
    });
  });
});
