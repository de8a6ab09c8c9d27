import {
  displayExecutionReport,
  displayNothingToDelete,
  displayPlan,
  displaySweepError,
} from '../../../commands/sweep/sweep.display';
import { ConfigError, ExternalError, NoCandidatesError } from '../../../core/exceptions';
import { buildPlan, compileFilter, LOCAL, remoteScope, RunMode, Scope } from '../../../core/retention';
import { display } from '../../../utils';

jest.mock('../../../utils', () => ({
  display: {
    info: jest.fn(),
    success: jest.fn(),
    warning: jest.fn(),
    error: jest.fn(),
  },
}));

const mockedDisplay = jest.mocked(display);

const makePlan = (mode: RunMode, scope: Scope = LOCAL) =>
  buildPlan({
    candidates: ['feature-a', 'main'],
    filter: compileFilter({ protection: ['main'] }),
    scope,
    mode,
    target: 'origin/main',
  });

/** First argument of the only call to a display function */
const shownContent = (fn: { mock: { calls: unknown[][] } }): string => {
  expect(fn).toHaveBeenCalledTimes(1);
  return String(fn.mock.calls[0]?.[0]);
};

describe('sweep display', () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('displayPlan', () => {
    test('a dry run is an info box with a hint to apply', () => {
      displayPlan(makePlan('dry-run'));

      const content = shownContent(mockedDisplay.info);
      expect(content).toContain('Would delete 1 branch(es):');
      expect(content).toContain('feature-a');
      expect(content).toContain('--apply');
      expect(mockedDisplay.warning).not.toHaveBeenCalled();
    });

    test('apply is a warning box that mentions Ctrl+C', () => {
      displayPlan(makePlan('apply'));

      const content = shownContent(mockedDisplay.warning);
      expect(content).toContain('Will delete 1 branch(es):');
      expect(content).toContain('Ctrl+C');
    });

    test('remote branches are shown with the remote name', () => {
      displayPlan(makePlan('dry-run', remoteScope('origin')));

      expect(shownContent(mockedDisplay.info)).toContain('origin/feature-a');
    });
  });

  describe('displayExecutionReport', () => {
    test('all deleted is a success box', () => {
      const plan = makePlan('apply');
      displayExecutionReport({ plan, deleted: ['feature-a'], failed: [] });

      expect(shownContent(mockedDisplay.success)).toContain('feature-a');
      expect(String(mockedDisplay.success.mock.calls[0]?.[1])).toContain('Deleted 1 branch(es)');
    });

    test('failures are listed with git message', () => {
      const plan = makePlan('apply');
      displayExecutionReport({
        plan,
        deleted: [],
        failed: [{ branch: 'feature-a', success: false, message: 'not fully merged' }],
      });

      const content = shownContent(mockedDisplay.error);
      expect(content).toContain('feature-a');
      expect(content).toContain('not fully merged');
      expect(String(mockedDisplay.error.mock.calls[0]?.[1])).toContain('1 of 1 deletion(s) failed');
    });
  });

  test('displayNothingToDelete shows the reason', () => {
    displayNothingToDelete(new NoCandidatesError('No branches are merged into origin/main'));

    expect(shownContent(mockedDisplay.info)).toContain('No branches are merged into origin/main');
  });

  describe('displaySweepError', () => {
    test('configuration errors come with usage', () => {
      displaySweepError(new ConfigError('One of --local or --remote <name> is required'));

      const content = shownContent(mockedDisplay.error);
      expect(content).toContain('One of --local or --remote <name> is required');
      expect(content).toContain('branch-sweep --remote origin');
      expect(String(mockedDisplay.error.mock.calls[0]?.[1])).toContain('ConfigError');
    });

    test('git errors come with troubleshooting steps', () => {
      displaySweepError(new ExternalError('branch --merged', new Error('fatal: bad revision')));

      const content = shownContent(mockedDisplay.error);
      expect(content).toContain('fatal: bad revision');
      expect(content).toContain('--into <branch>');
    });
  });
});
