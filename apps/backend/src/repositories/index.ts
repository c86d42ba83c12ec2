import type { Database } from '../lib/db.js';
import type { RepositoryContext } from './types.js';
import { createPermissionGroupRepository } from './PermissionGroupRepository.js';
import { createActorRepository } from './ActorRepository.js';
import { createModerationPolicyRepository } from './ModerationPolicyRepository.js';
import { createModerationLogRepository } from './ModerationLogRepository.js';

export function createRepositoryContext(db: Database): RepositoryContext {
  return {
    groups: createPermissionGroupRepository(db),
    actors: createActorRepository(db),
    policies: createModerationPolicyRepository(db),
    moderationLog: createModerationLogRepository(db),
  };
}

export type * from './types.js';
