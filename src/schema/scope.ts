import type { Logger } from '../logger.js';
import { InternalError } from '../validation/errors.js';
import { buildScope } from './index-builder.js';
import type { Scope } from './index-builder.js';
import type { RecordType } from './types.js';

/**
 * Per-call stack of scopes, one frame per record boundary crossed during a
 * traversal. Never shared between conversion calls.
 */
export class ScopeStack {
  private readonly frames: Scope[] = [];

  constructor(private readonly logger?: Logger) {}

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Pushes the scope of `record`, using the current top's attribute index as
   * the enclosing one.
   */
  push(record: RecordType, path = '$'): Scope {
    const enclosing = this.frames.at(-1);
    const scope = buildScope(record, enclosing?.attributeIndex, path);
    this.frames.push(scope);
    this.logger?.trace({ path, record: record.name, depth: this.frames.length }, 'scope pushed');
    return scope;
  }

  pop(): Scope {
    const scope = this.frames.pop();
    if (!scope) {
      throw new InternalError('pop() called on an empty scope stack');
    }
    this.logger?.trace({ record: scope.record.name, depth: this.frames.length }, 'scope popped');
    return scope;
  }

  current(): Scope {
    const scope = this.frames.at(-1);
    if (!scope) {
      throw new InternalError('current() called on an empty scope stack');
    }
    return scope;
  }
}
