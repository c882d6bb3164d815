/**
 * Per-request output cache
 * 每次请求的输出缓存
 *
 * Maps output port ids to computed values for the duration of one
 * evaluation request. Never shared between requests.
 * 在一次求值请求期间，将输出端口ID映射到计算出的值。请求之间不共享。
 */

import type { Value } from '../values';
import type { OutputId } from '../graph/types';

export class OutputCache {
  private values = new Map<OutputId, Value>();

  get(output: OutputId): Value | undefined {
    return this.values.get(output);
  }

  has(output: OutputId): boolean {
    return this.values.has(output);
  }

  set(output: OutputId, value: Value): void {
    this.values.set(output, value);
  }

  /** Number of populated outputs 已填充的输出数量 */
  get size(): number {
    return this.values.size;
  }

  keys(): OutputId[] {
    return Array.from(this.values.keys());
  }

  entries(): Array<[OutputId, Value]> {
    return Array.from(this.values.entries());
  }
}
