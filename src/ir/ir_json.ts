/**
 * IR 图 JSON 序列化封装（版本化）
 *
 * 图以声明式树的形式存放在 `graph.nodes` 中，读取时先经 JSON Schema
 * （项目根目录的 ir.schema.json）校验，再落成 arena；`validateOnLoad` 开启时
 * 还会执行结构校验。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { ConfigService } from '../config/config-service.js';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, type Diagnostic } from '../diagnostics/diagnostics.js';
import type { IrTreeNode } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { buildGraph, toTree } from './builder.js';
import type { Graph } from './graph.js';
import { validateGraph } from './validator.js';

export const GRAPH_JSON_VERSION = '1.0';

/**
 * JSON 容器（对象与数组）的最大嵌套层数。
 *
 * 封装本身占 3 层，每多一层控制节点再加 3 层（节点对象、blocks 数组、块数组），
 * 约合 330 层控制节点嵌套。ajv 的校验函数与 `JSON.stringify` 都是递归实现，
 * 超过此值的输入在进入它们之前以 J006 拒绝；游标本身没有深度限制。
 */
export const MAX_JSON_DEPTH = 1000;

/**
 * IR 图 JSON 封装接口
 */
export interface GraphEnvelope {
  /** JSON schema 版本 */
  version: typeof GRAPH_JSON_VERSION;
  graph: {
    /** 根块中的节点 */
    nodes: IrTreeNode[];
  };
  metadata?: {
    /** 生成时间（ISO 8601 格式） */
    generatedAt?: string;
    /** 来源描述 */
    source?: string;
    toolVersion?: string;
  };
}

// 从 src/ir（源码运行）或 dist/src/ir（编译产物）回到项目根目录
const here = dirname(fileURLToPath(import.meta.url));
const schemaPath = [join(here, '..', '..', 'ir.schema.json'), join(here, '..', '..', '..', 'ir.schema.json')].find(
  candidate => existsSync(candidate)
);
if (!schemaPath) {
  throw new Error(`ir.schema.json not found near ${here}`);
}
const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

const ajv = new Ajv({ strict: true, allErrors: true });
const validateEnvelope: ValidateFunction<GraphEnvelope> = ajv.compile<GraphEnvelope>(schema);

/**
 * 将图序列化为 JSON 字符串（2 空格缩进）
 *
 * 嵌套超过 `MAX_JSON_DEPTH` 时抛出携带 J006 的 `DiagnosticError`。
 *
 * @example
 * ```typescript
 * const json = serializeGraph(graph, { source: 'loop-nest.json' });
 * ```
 */
export function serializeGraph(graph: Graph, metadata?: GraphEnvelope['metadata']): string {
  const envelope: GraphEnvelope = {
    version: GRAPH_JSON_VERSION,
    graph: { nodes: toTree(graph) },
    ...(metadata ? { metadata } : {}),
  };
  if (exceedsDepth(envelope, MAX_JSON_DEPTH)) {
    throw new DiagnosticError(nestingTooDeep());
  }
  return JSON.stringify(envelope, null, 2);
}

/**
 * 从 JSON 字符串读取图
 *
 * @returns 图，或诊断数组
 */
export function parseGraphJson(json: string): Graph | Diagnostic[] {
  let envelope: unknown;
  try {
    envelope = JSON.parse(json);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return [
      DiagnosticBuilder.error(DiagnosticCode.J001_InvalidJson)
        .withMessage(`Invalid JSON: ${message}`)
        .withPath('')
        .build(),
    ];
  }

  const version = readVersion(envelope);
  if (version !== GRAPH_JSON_VERSION) {
    return [
      DiagnosticBuilder.error(DiagnosticCode.J002_UnsupportedVersion)
        .withMessage(`Unsupported graph JSON version: ${version ?? 'missing'}. Expected: ${GRAPH_JSON_VERSION}`)
        .withPath('/version')
        .build(),
    ];
  }

  if (exceedsDepth(envelope, MAX_JSON_DEPTH)) {
    return [nestingTooDeep()];
  }

  if (!validateEnvelope(envelope)) {
    return (validateEnvelope.errors ?? []).map(mapAjvError);
  }

  const graph = buildGraph(envelope.graph.nodes);
  if (ConfigService.getInstance().validateOnLoad) {
    const problems = validateGraph(graph);
    if (problems.length > 0) return problems;
  }

  createLogger('ir-json').debug('graph loaded', { nodes: graph.nodeCount, blocks: graph.blockCount });
  return graph;
}

/**
 * 读取并解析图文件
 */
export function loadGraphFile(filePath: string): Graph | Diagnostic[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return [
        DiagnosticBuilder.error(DiagnosticCode.J004_FileNotFound)
          .withMessage(`Graph file not found: ${filePath}`)
          .build(),
      ];
    }
    const message = err instanceof Error ? err.message : String(err);
    return [
      DiagnosticBuilder.error(DiagnosticCode.J005_FileUnreadable)
        .withMessage(`Failed to read graph file ${filePath}: ${message}`)
        .build(),
    ];
  }
  return parseGraphJson(content);
}

/**
 * 验证 JSON 字符串是否为可加载的图
 */
export function isValidGraphJson(json: string): boolean {
  return !Array.isArray(parseGraphJson(json));
}

function readVersion(envelope: unknown): string | undefined {
  if (!envelope || typeof envelope !== 'object' || Array.isArray(envelope)) return undefined;
  if (!('version' in envelope)) return undefined;
  return typeof envelope.version === 'string' ? envelope.version : String(envelope.version);
}

/**
 * 非递归地判断 JSON 值中是否有容器嵌套超过 `limit` 层。
 */
function exceedsDepth(value: unknown, limit: number): boolean {
  const pending: Array<{ value: unknown; depth: number }> = [{ value, depth: 1 }];
  let item = pending.pop();
  while (item) {
    const current = item.value;
    if (typeof current === 'object' && current !== null) {
      if (item.depth > limit) return true;
      const children: unknown[] = Array.isArray(current) ? current : Object.values(current);
      for (const child of children) pending.push({ value: child, depth: item.depth + 1 });
    }
    item = pending.pop();
  }
  return false;
}

function nestingTooDeep(): Diagnostic {
  return DiagnosticBuilder.error(DiagnosticCode.J006_NestingTooDeep)
    .withMessage(`Graph JSON nests deeper than ${MAX_JSON_DEPTH} levels`)
    .withPath('')
    .build();
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function mapAjvError(error: ErrorObject): Diagnostic {
  const path = error.instancePath;
  const detail =
    error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string'
      ? `unknown property '${error.params.additionalProperty}'`
      : error.message ?? error.keyword;
  return DiagnosticBuilder.error(DiagnosticCode.J003_SchemaViolation)
    .withMessage(`${path || '/'}: ${detail}`)
    .withPath(path)
    .build();
}
