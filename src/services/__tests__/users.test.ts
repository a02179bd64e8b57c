import { describe, it, expect, beforeEach } from 'vitest';
import { createUserService, getLearningProgressResponse } from '../users';
import { memoryRepositories } from '../../__tests__/helpers/memory';

const CREATED = new Date('2026-01-10T08:00:00.000Z');
const LATER = new Date('2026-01-11T08:00:00.000Z');

describe('user service', () => {
  let repos: ReturnType<typeof memoryRepositories>;
  let clock: Date;
  let users: ReturnType<typeof createUserService>;

  beforeEach(() => {
    repos = memoryRepositories();
    clock = CREATED;
    users = createUserService({ users: repos.users, learningProgress: repos.learningProgress, now: () => clock });
  });

  it('creates a profile keyed by uid', async () => {
    const profile = await users.createUserProfile('user-1', 'learner@example.com', 'Test Learner');

    expect(profile).toEqual({
      uid: 'user-1',
      email: 'learner@example.com',
      displayName: 'Test Learner',
      avatarUrl: null,
      preferences: {},
      createdAt: CREATED,
      updatedAt: CREATED,
    });
    expect(await users.getUserProfile('user-1')).toEqual(profile);
  });

  it('returns null for an unknown profile', async () => {
    expect(await users.getUserProfile('ghost')).toBeNull();
  });

  it('patches a profile and bumps updatedAt', async () => {
    await users.createUserProfile('user-1', 'learner@example.com', 'Test Learner');
    clock = LATER;

    const updated = await users.updateUserProfile('user-1', { displayName: 'Renamed', preferences: { theme: 'dark' } });

    expect(updated).toMatchObject({ displayName: 'Renamed', preferences: { theme: 'dark' }, createdAt: CREATED, updatedAt: LATER });
    expect(await users.getUserProfile('user-1')).toEqual(updated);
  });

  it('refuses to update a missing profile', async () => {
    await expect(users.updateUserProfile('ghost', { displayName: 'Nobody' })).rejects.toMatchObject({
      code: 'not-found',
      message: 'User profile not found',
    });
  });

  it('creates learning progress on first update with defaults for the rest', async () => {
    const progress = await users.updateLearningProgress('user-1', { totalTimeSpent: 120 });

    expect(progress).toEqual({
      completedLessons: [],
      currentLesson: null,
      totalTimeSpent: 120,
      statistics: {},
      lastActive: CREATED,
    });
    expect(repos.learningProgress.writes.map((w) => w.op)).toEqual(['set']);
  });

  it('merges later progress updates', async () => {
    await users.updateLearningProgress('user-1', { totalTimeSpent: 120 });
    clock = LATER;

    const progress = await users.updateLearningProgress('user-1', { statistics: { streak: 2 } });

    expect(progress).toMatchObject({ totalTimeSpent: 120, statistics: { streak: 2 }, lastActive: LATER });
    expect(repos.learningProgress.writes.map((w) => w.op)).toEqual(['set', 'update']);
  });

  it('serves empty progress to a learner who has none', async () => {
    expect(await getLearningProgressResponse(users, 'user-1')).toEqual({
      completedLessons: [],
      currentLesson: null,
      totalTimeSpent: 0,
      statistics: {},
      lastActive: null,
    });
  });
});
