import { CycleCommitter } from '@/application/services/controlLoop/modules';
import { LoggerMock } from '@mocks/infrastructure/logging/logger.mock';
import { RepositoryMock } from '@mocks/infrastructure/vcs/repository.mock';
import { ClockMock } from '@mocks/domain/clock.mock';

describe('CycleCommitter', () => {
  let logger: LoggerMock;
  let repository: RepositoryMock;
  let committer: CycleCommitter;

  beforeEach(() => {
    logger = new LoggerMock();
    repository = new RepositoryMock({ initialized: true, dirty: false });
    committer = new CycleCommitter(repository, logger, new ClockMock(new Date(2026, 9, 19, 11, 0, 30)));
  });

  it('commits all changes with a timestamped message', async () => {
    repository.touch();

    const result = await committer.commitIfChanged();

    expect(result).toEqual({ committed: true, message: 'Auto-commit: 2026-10-19 11:00:30' });
    expect(repository.commits).toEqual(['Auto-commit: 2026-10-19 11:00:30']);
    expect(logger.messages('success')).toEqual(['Auto-commit complete: Auto-commit: 2026-10-19 11:00:30']);
  });

  it('creates no commit when the tree is clean', async () => {
    const result = await committer.commitIfChanged();

    expect(result).toEqual({ committed: false });
    expect(repository.operations()).toEqual(['hasUncommittedChanges']);
    expect(logger.messages('info')).toEqual(['No file changes, skipping commit']);
  });

  it('logs and reports a failed commit without throwing', async () => {
    repository.touch();
    repository.failOn('commit', new Error('index.lock exists'));

    const result = await committer.commitIfChanged();

    expect(result).toEqual({ committed: false, error: 'index.lock exists' });
    expect(logger.messages('error')).toEqual(['Auto-commit failed: index.lock exists']);
  });

  it('picks up uncommitted changes on the next attempt', async () => {
    repository.touch();
    repository.failOn('commit');
    await committer.commitIfChanged();

    repository.clearFailures();
    const result = await committer.commitIfChanged();

    expect(result.committed).toBe(true);
    expect(repository.commits).toHaveLength(1);
  });
});
