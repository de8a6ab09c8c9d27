import {
  runSweep,
  SweepContext,
  validateSweepOptions,
} from '../../../commands/sweep/sweep.handler';
import { displayExecutionReport, displayPlan } from '../../../commands/sweep/sweep.display';
import { ConfigError, NoCandidatesError, SweepAbortedError } from '../../../core/exceptions';
import { PlanExecutor } from '../../../core/executor';
import { GitBackend } from '../../../core/git';
import { PersistedSettings } from '../../../core/retention';
import { spinner } from '../../../utils';

jest.mock('../../../commands/sweep/sweep.display', () => ({
  displayPlan: jest.fn(),
  displayExecutionReport: jest.fn(),
}));

jest.mock('../../../utils', () => ({
  logger: {
    debug: jest.fn(),
  },
  spinner: {
    start: jest.fn(),
    update: jest.fn(),
    stop: jest.fn(),
    fail: jest.fn(),
  },
}));

const mockedDisplayPlan = jest.mocked(displayPlan);
const mockedDisplayReport = jest.mocked(displayExecutionReport);
const mockedSpinner = jest.mocked(spinner);

const makeBackendMock = () => {
  const mock: jest.Mocked<GitBackend> = {
    listMerged: jest.fn(),
    deleteBranches: jest.fn(),
  };
  return mock;
};

const settings = (
  protectedBranches: string | null = null,
  mergeTarget: string | null = null
): PersistedSettings => ({
  protectedBranches: () => protectedBranches,
  mergeTarget: () => mergeTarget,
});

describe('runSweep', () => {
  let backend: jest.Mocked<GitBackend>;
  let context: SweepContext;

  beforeEach(() => {
    jest.clearAllMocks();
    backend = makeBackendMock();
    context = {
      backend,
      settings: settings(),
      executor: new PlanExecutor(backend, { wait: async () => undefined }),
    };
  });

  test('a dry run shows the plan and deletes nothing', async () => {
    backend.listMerged.mockResolvedValue(['main', 'feature-a', 'develop', 'feature-b']);

    const report = await runSweep({ local: true }, context);

    expect(backend.listMerged).toHaveBeenCalledWith('origin/master', { kind: 'local' });
    expect(report.plan.selected).toEqual(['feature-a', 'feature-b']);
    expect(report.plan.mode).toBe('dry-run');
    expect(mockedDisplayPlan).toHaveBeenCalledWith(report.plan);
    expect(backend.deleteBranches).not.toHaveBeenCalled();
    expect(mockedSpinner.start).not.toHaveBeenCalled();
    expect(mockedDisplayReport).not.toHaveBeenCalled();
  });

  test('apply deletes the selection on the chosen remote', async () => {
    backend.listMerged.mockResolvedValue(['patch-1', 'patch-2', 'release']);
    backend.deleteBranches.mockResolvedValue([
      { branch: 'patch-1', success: true },
      { branch: 'patch-2', success: true },
    ]);

    const report = await runSweep(
      { remote: 'origin', apply: true, match: 'patch-.*', into: 'origin/main' },
      context
    );

    expect(backend.listMerged).toHaveBeenCalledWith('origin/main', {
      kind: 'remote',
      remote: 'origin',
    });
    expect(backend.deleteBranches).toHaveBeenCalledWith(['patch-1', 'patch-2'], {
      kind: 'remote',
      remote: 'origin',
    });
    expect(report.deleted).toEqual(['patch-1', 'patch-2']);
    expect(mockedSpinner.start).toHaveBeenCalledTimes(1);
    expect(mockedSpinner.stop).toHaveBeenCalledTimes(1);
    expect(mockedDisplayReport).toHaveBeenCalledWith(report);
  });

  test('the skip list replaces the configured protection', async () => {
    context.settings = settings('feature-a');
    backend.listMerged.mockResolvedValue(['feature-a', 'feature-b', 'main']);

    const report = await runSweep({ local: true, skip: 'feature-b' }, context);

    expect(report.plan.selected).toEqual(['feature-a', 'main']);
    expect(report.plan.skipped).toEqual(['feature-b']);
  });

  test('uses the configured target', async () => {
    context.settings = settings(null, 'upstream/trunk');
    backend.listMerged.mockResolvedValue(['feature-a']);

    await runSweep({ local: true }, context);

    expect(backend.listMerged).toHaveBeenCalledWith('upstream/trunk', { kind: 'local' });
  });

  test('a dry run does not listen for Ctrl+C', async () => {
    const interrupts = jest.fn();
    backend.listMerged.mockResolvedValue(['feature-a']);

    await runSweep({ local: true }, { ...context, interrupts });

    expect(interrupts).not.toHaveBeenCalled();
  });

  test('configuration errors surface before git is asked', async () => {
    await expect(runSweep({ local: true, match: '(' }, context)).rejects.toBeInstanceOf(
      ConfigError
    );
    await expect(runSweep({}, context)).rejects.toBeInstanceOf(ConfigError);
    expect(backend.listMerged).not.toHaveBeenCalled();
  });

  test('nothing to delete raises NoCandidatesError', async () => {
    backend.listMerged.mockResolvedValue(['main', 'master']);

    await expect(runSweep({ local: true, apply: true }, context)).rejects.toBeInstanceOf(
      NoCandidatesError
    );
    expect(mockedDisplayPlan).not.toHaveBeenCalled();
    expect(backend.deleteBranches).not.toHaveBeenCalled();
  });

  test('an interrupted countdown fails the spinner and deletes nothing', async () => {
    const controller = new AbortController();
    controller.abort();
    backend.listMerged.mockResolvedValue(['feature-a']);

    const release = jest.fn();
    const interrupts = jest.fn(() => ({ signal: controller.signal, release }));

    await expect(
      runSweep({ local: true, apply: true }, { ...context, interrupts })
    ).rejects.toBeInstanceOf(SweepAbortedError);
    expect(interrupts).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledTimes(1);
    expect(mockedSpinner.fail).toHaveBeenCalledWith('Aborted, no branches were deleted');
    expect(backend.deleteBranches).not.toHaveBeenCalled();
  });
});

describe('validateSweepOptions', () => {
  test('returns the scope for valid flags', () => {
    expect(validateSweepOptions({ remote: 'origin', match: '^feature/' })).toEqual({
      kind: 'remote',
      remote: 'origin',
    });
  });

  test('rejects a missing scope and malformed patterns', () => {
    expect(() => validateSweepOptions({})).toThrow(
      'One of --local or --remote <name> is required'
    );
    expect(() => validateSweepOptions({ local: true, ignore: '[' })).toThrow(
      /^Invalid --ignore pattern '\['/
    );
  });
});
