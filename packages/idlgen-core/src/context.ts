/**
 * Per-pass mutable state: indentation level and temporary name counter
 *
 * Each generator owns exactly one context, so separate targets can run
 * side by side without sharing counters.
 */

const INDENT_UNIT = '  ';

export class GenerationContext {
  private indentLevel: number = 0;
  private tmpCounter: number = 0;

  get level(): number {
    return this.indentLevel;
  }

  indentUp(): void {
    ++this.indentLevel;
  }

  indentDown(): void {
    if (this.indentLevel === 0) {
      throw new Error('indentDown called without matching indentUp');
    }
    --this.indentLevel;
  }

  indent(): string {
    return INDENT_UNIT.repeat(this.indentLevel);
  }

  /**
   * Unique name: prefix followed by the next counter value (e.g. "val35").
   * The counter is shared by all prefixes.
   */
  tmp(prefix: string): string {
    return `${prefix}${this.tmpCounter++}`;
  }
}
