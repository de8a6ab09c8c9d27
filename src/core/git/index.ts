import { SimpleGitBackend } from './simple-git-backend';

export { SimpleGitBackend };
export type { GitBackend, DeletionResult } from './types';
