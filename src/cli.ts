/**
 * The `sparsemat` command.
 *
 * ```sh
 * sparsemat addition a.txt b.txt          # or 3 / add
 * sparsemat mul a.txt b.txt -o product.txt
 * sparsemat                               # prompts for files and operation
 * ```
 *
 * The result is printed and written to the output path (`result.txt` unless
 * configured). Nothing is written when loading, selection or the shape check
 * fails.
 */

import { createInterface } from 'node:readline/promises';
import yargs from 'yargs';

import { resolveConfig } from './config.js';
import type { CalculatorConfig, Env } from './config.js';
import { InvalidArgumentsError, SparseMatrixError } from './error.js';
import { formatSparseMatrix } from './format/index.js';
import { fileStore, loadMatrix, saveMatrix } from './io.js';
import type { TextStore } from './io.js';
import { operationMenu, selectOperation } from './operations.js';
import type { Operation } from './operations.js';
import { ConsoleReporter } from './reporter.js';
import type { Reporter } from './reporter.js';
import type { SparseMatrix } from './sparse/index.js';

export interface CalculatorDeps {
  readonly store: TextStore;
  readonly reporter: Reporter;
  readonly config: CalculatorConfig;
}

export interface CalculationRequest {
  /** Menu key, name or alias, see `selectOperation` */
  readonly operation: string;
  readonly first: string;
  readonly second: string;
}

/**
 * Line-oriented question/answer source for the interactive mode.
 */
export interface Prompt {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompt on a terminal (stdin / stdout by default).
 */
export function readlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}

async function complete(
  op: Operation,
  A: SparseMatrix,
  B: SparseMatrix,
  { store, reporter, config }: CalculatorDeps
): Promise<SparseMatrix> {
  const result = op.apply(A, B);

  reporter.info(`Output of ${op.name} operation:`);
  reporter.result(formatSparseMatrix(result));

  await saveMatrix(config.output, result, store);
  reporter.success(`Output file saved at: ${config.output}`);

  return result;
}

/**
 * Load both matrices, apply the operation, report and save the result.
 *
 * @throws SparseMatrixError on any load, parse, selection, shape or write failure
 */
export async function runCalculation(
  request: CalculationRequest,
  deps: CalculatorDeps
): Promise<SparseMatrix> {
  const op = selectOperation(request.operation);
  const A = await loadMatrix(request.first, deps.store);
  const B = await loadMatrix(request.second, deps.store);
  return complete(op, A, B, deps);
}

/**
 * Show the operations menu, then ask for the two files and the operation.
 *
 * @throws SparseMatrixError as `runCalculation`
 */
export async function runInteractive(prompt: Prompt, deps: CalculatorDeps): Promise<SparseMatrix> {
  const { store, reporter } = deps;

  reporter.info('Available operations:');
  for (const line of operationMenu()) {
    reporter.info(line);
  }

  const firstPath = await prompt.ask('Enter the file path for the first matrix: ');
  const A = await loadMatrix(firstPath.trim(), store);
  reporter.success('1st matrix loaded successfully.');

  const secondPath = await prompt.ask('Enter the file path for the second matrix: ');
  const B = await loadMatrix(secondPath.trim(), store);
  reporter.success('2nd matrix loaded successfully.');

  const choice = await prompt.ask('Choose an operation (1, 2, or 3): ');
  return complete(selectOperation(choice), A, B, deps);
}

export interface MainOptions {
  store?: TextStore;
  reporter?: Reporter;
  env?: Env;
  /** Used when no positional arguments are given */
  prompt?: Prompt;
}

interface ParsedArgs {
  readonly positionals: string[];
  readonly output: string | undefined;
  readonly color: boolean | undefined;
  /** Help text, when `--help` was given */
  readonly help: string | undefined;
}

/**
 * @throws InvalidArgumentsError for unknown options or malformed values
 */
async function parseArgs(argv: readonly string[]): Promise<ParsedArgs> {
  const parser = yargs([...argv])
    .scriptName('sparsemat')
    .usage('$0 [operation] [first] [second]\n\nAdd, subtract or multiply two sparse matrix files.')
    .locale('en')
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('output', {
      alias: 'o',
      type: 'string',
      describe: 'Where to write the result (default: result.txt, or $SPARSEMAT_OUTPUT)',
    })
    .option('color', {
      type: 'boolean',
      describe: 'Colour the output; --no-color disables it',
    })
    .option('help', {
      alias: 'h',
      type: 'boolean',
      describe: 'Show help',
    })
    .help(false)
    .version(false)
    .strictOptions()
    .exitProcess(false)
    .fail((message, err) => {
      throw new InvalidArgumentsError(message ?? err.message, { cause: err });
    });

  const args = await parser.parseAsync();

  return {
    positionals: args._.map(String),
    output: args.output,
    color: args.color,
    help: args.help === true ? await parser.getHelp() : undefined,
  };
}

/**
 * Run the command with already-stripped arguments.
 *
 * @returns the process exit code
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  let reporter = options.reporter ?? new ConsoleReporter({ color: resolveConfig({}, env).color });

  try {
    const args = await parseArgs(argv);
    const config = resolveConfig({ output: args.output, color: args.color }, env);
    reporter = options.reporter ?? new ConsoleReporter({ color: config.color });

    if (args.help !== undefined) {
      reporter.info(args.help);
      return 0;
    }

    const deps: CalculatorDeps = { store: options.store ?? fileStore, reporter, config };
    const { positionals } = args;

    if (positionals.length === 0) {
      const prompt = options.prompt ?? readlinePrompt();
      try {
        await runInteractive(prompt, deps);
      } finally {
        prompt.close();
      }
    } else if (positionals.length === 3) {
      const [operation = '', first = '', second = ''] = positionals;
      await runCalculation({ operation, first, second }, deps);
    } else {
      throw new InvalidArgumentsError(
        `Expected an operation and two matrix files, got ${positionals.length} argument(s)`
      );
    }
  } catch (err) {
    if (err instanceof SparseMatrixError) {
      reporter.error(err.message);
      return 1;
    }
    throw err;
  }

  return 0;
}
