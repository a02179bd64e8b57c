import type { Repositories } from '../stores/firestore';
import { createActivityService } from './activity';
import type { AnswerGenerator } from './ai';
import { createAnalyticsService, type AnalyticsService } from './analytics';
import { createLessonService, type LessonService } from './lessons';
import { createQAService, type QAService } from './qa';
import { createUserService, type UserService } from './users';

export interface Services {
  users: UserService;
  qa: QAService;
  lessons: LessonService;
  analytics: AnalyticsService;
}

export function createServices(repos: Repositories, generator: AnswerGenerator, now?: () => Date): Services {
  const users = createUserService({ users: repos.users, learningProgress: repos.learningProgress, now });
  const activity = createActivityService({ activity: repos.activity, now });
  const lessons = createLessonService({
    lessons: repos.lessons,
    lessonProgress: repos.lessonProgress,
    users,
    activity,
    generator,
    now,
  });
  return {
    users,
    qa: createQAService({ records: repos.qa, lessons: repos.lessons, generator, now }),
    lessons,
    analytics: createAnalyticsService({ users, lessons, activity, now }),
  };
}
