import { Command } from 'commander';
import { TypedConfig } from '@/core/config';
import { PlanExecutor } from '@/core/executor';
import {
  ExitCode,
  exitCodeFor,
  NoCandidatesError,
  SweepAbortedError,
} from '@/core/exceptions';
import { SimpleGitBackend } from '@/core/git';
import { listenForInterrupt, spinner } from '@/utils';
import { createConfigManager, parseConfigOverrides } from '../config/config.handler';
import { runSweep, SweepOptions, validateSweepOptions } from './sweep.handler';
import { displayAborted, displayNothingToDelete, displaySweepError } from './sweep.display';

interface SweepCommandOptions extends SweepOptions {
  config?: string[];
}

/**
 * The sweep is the program's own action, so its flags sit next to the global
 * ones: `branch-sweep --local --verbose`.
 */
export const registerSweep = (program: Command): Command =>
  program
    .option('-a, --apply', 'Delete the branches (default is a dry run)')
    .option('-l, --local', 'Sweep local branches')
    .option('-r, --remote [name]', 'Sweep branches on the named remote')
    .option('-s, --skip <branches>', 'Comma-separated branches to protect (replaces sweep.protected)')
    .option('-m, --match <pattern>', 'Only branches matching this regular expression')
    .option('-i, --ignore <pattern>', 'Leave branches matching this regular expression')
    .option('-t, --into <branch>', 'Branch the others must be merged into (default sweep.target)')
    .action(async (options: SweepCommandOptions) => {
      try {
        validateSweepOptions(options);

        const backend = await SimpleGitBackend.open(process.cwd());
        const config = await createConfigManager(
          backend.gitDir,
          parseConfigOverrides(options.config ?? [])
        );
        const executor = new PlanExecutor(backend, {
          onCountdown: (seconds) => spinner.update(`Deleting in ${seconds}s… (Ctrl+C to abort)`),
        });

        const report = await runSweep(options, {
          backend,
          settings: new TypedConfig(config),
          executor,
          interrupts: listenForInterrupt,
        });
        process.exitCode = report.failed.length > 0 ? ExitCode.FAILURE : ExitCode.SUCCESS;
      } catch (error) {
        if (error instanceof NoCandidatesError) {
          displayNothingToDelete(error);
        } else if (error instanceof SweepAbortedError) {
          displayAborted(error);
        } else {
          displaySweepError(error);
        }
        process.exitCode = exitCodeFor(error);
      }
    });
