import { MissingEnvelopeFieldError, SchemaMismatchError } from "../exchange/errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 解析响应文本，非法 JSON 视为结构不符。
 */
export function parseDocument(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new SchemaMismatchError("$", "JSON");
  }
}

/**
 * 按路径逐层读取响应包裹层，返回末端数组。
 * 字段缺失（或为 null）时报告具体缺失的字段与路径，中间层不是对象或末端不是数组时报告结构不符。
 */
export function readEnvelopeArray(document: unknown, path: readonly string[]): unknown[] {
  let current: unknown = document;
  const visited: string[] = [];
  for (const field of path) {
    if (!isRecord(current)) {
      throw new SchemaMismatchError(visited.length > 0 ? visited.join(".") : "$", "object");
    }
    visited.push(field);
    const next = current[field];
    if (next === undefined || next === null) {
      throw new MissingEnvelopeFieldError(field, visited.join("."));
    }
    current = next;
  }
  if (!Array.isArray(current)) {
    throw new SchemaMismatchError(visited.length > 0 ? visited.join(".") : "$", "array");
  }
  return current;
}
