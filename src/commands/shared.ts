import * as settings from '../config/settings.js';
import type { Settings } from '../config/schema.js';
import { repoLayout, resolveRepoRoot } from '../core/repo.js';
import type { RepoLayout } from '../types/repo.js';

export interface RepoContext {
  settings: Settings;
  layout: RepoLayout;
}

export interface RepoOption {
  repo?: string;
}

export function openRepo(opts: RepoOption): RepoContext {
  settings.init();
  const resolved = settings.resolved();
  return {
    settings: resolved,
    layout: repoLayout(resolveRepoRoot(opts.repo, resolved)),
  };
}
