import { describeError } from '../lib/errors';
import { mergePdfs } from '../lib/merge';
import { USAGE, parseCliArgs } from './options';

/**
 * Runs the command line and resolves with the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      console.log(USAGE);
      return 0;
    }

    const result = await mergePdfs(command.request, {
      onProgress: command.verbose
        ? (completed, total) => console.info(`Composed output page ${completed} of ${total}`)
        : undefined,
    });

    console.log(`Created: ${result.outputPath}`);
    return 0;
  } catch (error) {
    console.error(`Merge failed: ${describeError(error)}`);
    return 1;
  }
}
