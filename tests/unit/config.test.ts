import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '../../src/config.js';

describe('resolveConfig', () => {
  it('uses defaults with an empty environment', () => {
    expect(resolveConfig({}, {})).toEqual({ output: 'result.txt', color: true });
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads the output path from the environment', () => {
    expect(resolveConfig({}, { SPARSEMAT_OUTPUT: ' out/sum.txt ' }).output).toBe('out/sum.txt');
  });

  it('ignores a blank output variable', () => {
    expect(resolveConfig({}, { SPARSEMAT_OUTPUT: '  ' }).output).toBe('result.txt');
  });

  it('disables colour when NO_COLOR is set', () => {
    expect(resolveConfig({}, { NO_COLOR: '1' }).color).toBe(false);
    expect(resolveConfig({}, { NO_COLOR: '' }).color).toBe(true);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = resolveConfig(
      { output: 'flag.txt', color: true },
      { SPARSEMAT_OUTPUT: 'env.txt', NO_COLOR: '1' }
    );
    expect(config).toEqual({ output: 'flag.txt', color: true });
  });

  it('skips undefined overrides', () => {
    const config = resolveConfig({ output: undefined }, { SPARSEMAT_OUTPUT: 'env.txt' });
    expect(config.output).toBe('env.txt');
  });
});
