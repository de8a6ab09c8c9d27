export const DEFAULT_PROTECTED_BRANCHES: readonly string[] = ['master', 'main', 'develop'];

export const DEFAULT_MERGE_TARGET = 'origin/master';
