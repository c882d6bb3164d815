/**
 * Graph editing errors
 * 图编辑错误
 */

/**
 * Connection rejected by graph validation.
 * 图验证拒绝的连接。
 */
export class ConnectionError extends Error {
  constructor(message: string) {
    super(`Invalid connection: ${message}`);
    this.name = 'ConnectionError';
  }
}

/**
 * Serialized graph document is malformed or incompatible.
 * 序列化图文档格式错误或不兼容。
 */
export class GraphDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphDocumentError';
  }
}
