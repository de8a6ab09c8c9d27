import chalk from 'chalk';
import { ExecutionReport } from '@/core/executor';
import {
  ConfigError,
  errorMessage,
  ExternalError,
  NoCandidatesError,
  SweepAbortedError,
} from '@/core/exceptions';
import { BranchName, Plan, Scope } from '@/core/retention';
import { display } from '@/utils';
import { formatLabelValue } from '@/utils/cli/display';

const qualify = (scope: Scope, branch: BranchName): string =>
  scope.kind === 'remote' ? `${scope.remote}/${branch}` : branch;

const scopeLabel = (scope: Scope): string =>
  scope.kind === 'local' ? chalk.white('local') : chalk.white(`remote ${chalk.cyan(scope.remote)}`);

/**
 * Plan summary: where, against what, what is kept and what goes.
 */
export const displayPlan = (plan: Plan): void => {
  const isDryRun = plan.mode === 'dry-run';
  const title = isDryRun
    ? chalk.bold.blue('🔍 Dry Run: merged branches')
    : chalk.bold.yellow('🧹 Deleting merged branches');

  const lines = [
    formatLabelValue('📍 Scope', scopeLabel(plan.scope)),
    formatLabelValue('🎯 Merged into', chalk.white(plan.target)),
    formatLabelValue(
      '🛡️  Protected',
      plan.skipped.length > 0 ? chalk.green(plan.skipped.join(', ')) : chalk.gray('(none)')
    ),
    '',
    chalk.yellow(`${isDryRun ? 'Would delete' : 'Will delete'} ${plan.selected.length} branch(es):`),
    ...plan.selected.map((branch) => `  ${chalk.red('✗')} ${qualify(plan.scope, branch)}`),
  ];

  if (isDryRun) {
    lines.push('', `${chalk.blue('💡')} Run again with ${chalk.green('--apply')} to delete them`);
    display.info(lines.join('\n'), title);
  } else {
    lines.push('', `${chalk.gray('Press')} ${chalk.white('Ctrl+C')} ${chalk.gray('to abort')}`);
    display.warning(lines.join('\n'), title);
  }
};

export const displayExecutionReport = (report: ExecutionReport): void => {
  const { scope } = report.plan;
  const lines = [
    ...report.deleted.map((branch) => `${chalk.green('✓')} ${qualify(scope, branch)}`),
    ...report.failed.flatMap((result) => [
      `${chalk.red('✗')} ${qualify(scope, result.branch)}`,
      ...(result.message ? [`   └─ ${chalk.gray(result.message)}`] : []),
    ]),
  ];

  if (report.failed.length === 0) {
    display.success(lines.join('\n'), chalk.bold.green(`✅ Deleted ${report.deleted.length} branch(es)`));
  } else {
    display.error(
      lines.join('\n'),
      chalk.bold.red(`❌ ${report.failed.length} of ${report.plan.selected.length} deletion(s) failed`)
    );
  }
};

export const displayNothingToDelete = (error: NoCandidatesError): void => {
  display.info(
    [chalk.white(error.message), '', chalk.gray('Nothing to delete.')].join('\n'),
    chalk.bold.blue('✨ All clean')
  );
};

export const displayAborted = (error: SweepAbortedError): void => {
  display.warning(chalk.white(error.message), chalk.yellow('⏹️  Aborted'));
};

/**
 * Configuration and git failures, with a hint for the common causes
 */
export const displaySweepError = (error: unknown): void => {
  const details = [`${chalk.red('📋 Error Details:')}`, `   └─ ${chalk.white(errorMessage(error))}`];

  if (error instanceof ConfigError) {
    details.push(
      '',
      `${chalk.yellow('🔧 Usage:')}`,
      `   ${chalk.green('branch-sweep --local')}            ${chalk.gray('preview local branches')}`,
      `   ${chalk.green('branch-sweep --remote origin')}    ${chalk.gray('preview branches on origin')}`,
      `   ${chalk.green('--apply')}                         ${chalk.gray('actually delete')}`
    );
  } else if (error instanceof ExternalError) {
    details.push(
      '',
      `${chalk.yellow('🔧 Troubleshooting:')}`,
      `   ${chalk.gray('1.')} Check that the merge target exists (${chalk.green('--into <branch>')})`,
      `   ${chalk.gray('2.')} For remotes, check the network and your push permissions`,
      `   ${chalk.gray('3.')} Run with ${chalk.green('--verbose')} to see each git step`
    );
  }

  display.error(details.join('\n'), chalk.red(`❌ ${error instanceof Error ? error.name : 'Error'}`));
};
