/**
 * GenerationContext tests - indentation and temporary names
 */

import { describe, it, expect } from 'vitest';
import { GenerationContext } from './context';

describe('GenerationContext', () => {
  it('should start with no indentation', () => {
    const ctx = new GenerationContext();
    expect(ctx.level).toBe(0);
    expect(ctx.indent()).toBe('');
  });

  it('should indent two spaces per level', () => {
    const ctx = new GenerationContext();
    ctx.indentUp();
    ctx.indentUp();
    ctx.indentDown();
    expect(ctx.indent()).toBe('  ');

    ctx.indentUp();
    ctx.indentUp();
    expect(ctx.indent()).toBe('      ');
  });

  it('should refuse to go below zero', () => {
    const ctx = new GenerationContext();
    ctx.indentUp();
    ctx.indentDown();
    expect(() => ctx.indentDown()).toThrow('indentDown called without matching indentUp');
    expect(ctx.level).toBe(0);
  });

  it('should number temporary names in sequence', () => {
    const ctx = new GenerationContext();
    expect(ctx.tmp('x')).toBe('x0');
    expect(ctx.tmp('x')).toBe('x1');
    expect(ctx.tmp('elem')).toBe('elem2');
  });

  it('should share one counter across prefixes', () => {
    const ctx = new GenerationContext();
    expect(ctx.tmp('a')).toBe('a0');
    expect(ctx.tmp('b')).toBe('b1');
    expect(ctx.tmp('a')).toBe('a2');
  });

  it('should keep separate counters per context', () => {
    const first = new GenerationContext();
    const second = new GenerationContext();
    first.tmp('v');
    first.tmp('v');
    expect(second.tmp('v')).toBe('v0');
    expect(first.tmp('v')).toBe('v2');
  });
});
