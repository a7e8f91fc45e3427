/**
 * 归一化流程的错误基类，调用方可按具体子类区分处理。
 */
export class NormalizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NormalizerError";
  }
}

/**
 * 交易对格式非法，或编码回退链全部失败。
 */
export class InvalidPairFormatError extends NormalizerError {
  constructor(
    public readonly raw: string,
    public readonly exchange: string,
    reason?: string
  ) {
    super(`非法的 ${exchange} 交易对 '${raw}'${reason ? `: ${reason}` : ""}`);
    this.name = "InvalidPairFormatError";
  }
}

/**
 * 响应包裹层缺少某个路径字段。
 * field 为缺失的字段名，path 为截至该字段的完整路径。
 */
export class MissingEnvelopeFieldError extends NormalizerError {
  constructor(
    public readonly field: string,
    public readonly path: string
  ) {
    super(`响应中未找到字段 '${field}' (路径 ${path})`);
    this.name = "MissingEnvelopeFieldError";
  }
}

/**
 * 响应结构与预期类型不符。
 */
export class SchemaMismatchError extends NormalizerError {
  constructor(
    public readonly path: string,
    public readonly expected: string
  ) {
    super(`路径 ${path} 的值不是 ${expected}`);
    this.name = "SchemaMismatchError";
  }
}

/**
 * 批量记录中某一条解析失败，整批作废。
 */
export class RecordDecodeError extends NormalizerError {
  constructor(
    public readonly index: number,
    public readonly reason: string
  ) {
    super(`第 ${index} 条记录解析失败: ${reason}`);
    this.name = "RecordDecodeError";
  }
}

/**
 * 无法识别的链名称。
 */
export class UnrecognizedBlockchainError extends NormalizerError {
  constructor(public readonly chainName: string) {
    super(`无法识别的区块链: '${chainName}'`);
    this.name = "UnrecognizedBlockchainError";
  }
}
