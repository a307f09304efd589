import { ConfigurationError, describeError } from './utils/errors';
import { EXIT_CAPTURE_FAILED, EXIT_USAGE } from './utils/exitCodes';

type CliModule = typeof import('./controllers/cli.controller');

export interface MainOptions {
  /** Loads the CLI, and with it the environment configuration. */
  loadCli?: () => Promise<CliModule>;
  printError?: (line: string) => void;
}

/**
 * Runs the CLI and resolves to the process exit code. The configuration is validated
 * when the CLI module loads, so a bad environment becomes a usage error rather than a crash.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const loadCli = options.loadCli ?? (() => import('./controllers/cli.controller'));
  const printError = options.printError ?? ((line: string) => console.error(line));

  try {
    const { runCli } = await loadCli();
    return await runCli(argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(`Error: ${error.message}`);
      return EXIT_USAGE;
    }

    printError(`❌ Unexpected failure: ${describeError(error)}`);
    return EXIT_CAPTURE_FAILED;
  }
}
