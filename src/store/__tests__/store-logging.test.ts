/**
 * Store and engine events reach whichever logger is active when they happen.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockGetLogger, mockLogInfo, mockLogWarn, mockLogError, mockLogDebug } = vi.hoisted(() => ({
  mockGetLogger: vi.fn(),
  mockLogInfo: vi.fn(),
  mockLogWarn: vi.fn(),
  mockLogError: vi.fn(),
  mockLogDebug: vi.fn(),
}));

vi.mock('../../core/logger.js', () => ({
  getLogger: mockGetLogger,
}));

import { startTask } from '../../core/task-work/index.js';
import { applyEnhancementToStore } from '../../core/enhancement/index.js';
import {
  createTempProject,
  initStore,
  makeState,
  twoMilestoneSprint,
  type TempProject,
} from '../../../tests/helpers/sprint-fixtures.js';

describe('store logging', () => {
  let project: TempProject;

  beforeEach(async () => {
    // Loggers are only usable from here on, after every module has loaded.
    mockGetLogger.mockImplementation(() => ({
      info: mockLogInfo,
      warn: mockLogWarn,
      error: mockLogError,
      debug: mockLogDebug,
    }));
    project = await createTempProject();
  });

  afterEach(async () => {
    vi.clearAllMocks();
    mockGetLogger.mockReset();
    await project.cleanup();
  });

  it('logs initialisation through the store logger', async () => {
    await initStore(project, makeState(twoMilestoneSprint()));

    expect(mockGetLogger).toHaveBeenCalledWith('store');
    expect(mockLogInfo).toHaveBeenCalledWith({ sprintId: 'sprint-1', replaced: false }, 'sprint initialised');
  });

  it('logs committed transactions and milestone transitions', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));
    mockLogInfo.mockClear();

    await startTask(store, 'A');

    expect(mockGetLogger).toHaveBeenCalledWith('milestones');
    expect(mockLogInfo).toHaveBeenCalledWith({ milestoneId: 'M1' }, 'milestone started');
    expect(mockLogInfo).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'start A', written: ['task-graph.json', 'progress.json'] }),
      'transaction committed',
    );
  });

  it('logs placed enhancements', async () => {
    const store = await initStore(project, makeState(twoMilestoneSprint()));

    await applyEnhancementToStore(store, { description: 'Dark mode', tasks: [{ title: 'Theme tokens' }] });

    expect(mockGetLogger).toHaveBeenCalledWith('enhancement');
    expect(mockLogInfo).toHaveBeenCalledWith(
      expect.objectContaining({ featureId: 'F1' }),
      'enhancement placed',
    );
  });
});
