/**
 * Calculator configuration.
 *
 * Layered as defaults, then environment, then explicit overrides (CLI flags).
 */

export interface CalculatorConfig {
  /** Where the result matrix is written */
  readonly output: string;
  /** Colour console output */
  readonly color: boolean;
}

export const DEFAULT_CONFIG: CalculatorConfig = {
  output: 'result.txt',
  color: true,
};

export type Env = Readonly<Record<string, string | undefined>>;

function fromEnv(env: Env): Partial<CalculatorConfig> {
  const config: { output?: string; color?: boolean } = {};
  const output = env['SPARSEMAT_OUTPUT'];
  if (output !== undefined && output.trim() !== '') {
    config.output = output.trim();
  }
  if (env['NO_COLOR'] !== undefined && env['NO_COLOR'] !== '') {
    config.color = false;
  }
  return config;
}

function defined(overrides: Partial<CalculatorConfig>): Partial<CalculatorConfig> {
  const config: { output?: string; color?: boolean } = {};
  if (overrides.output !== undefined) config.output = overrides.output;
  if (overrides.color !== undefined) config.color = overrides.color;
  return config;
}

export function resolveConfig(
  overrides: Partial<CalculatorConfig> = {},
  env: Env = process.env
): CalculatorConfig {
  return { ...DEFAULT_CONFIG, ...fromEnv(env), ...defined(overrides) };
}
