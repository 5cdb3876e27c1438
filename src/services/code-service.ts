/**
 * Code Service
 *
 * Keeps the application checkout on a host in sync with version control.
 */

import { DEFAULT_BRANCH, DEFAULT_COMMIT } from '../constants';
import type { Settings } from '../types';
import { ValidationError } from '../utils/errors';
import type { RemoteExecutor } from './remote-executor';

export interface SyncOptions {
  branch?: string;
  commit?: string;
  /** Delete compiled cache files after checkout */
  clearCached?: boolean;
}

const REF_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._/-]*$/;

/**
 * Reject anything that is not a plain git ref, since refs end up in shell commands
 */
export function assertGitRef(ref: string, label: string): void {
  if (!REF_PATTERN.test(ref)) {
    throw new ValidationError(`Invalid ${label} "${ref}"`, 'Use a branch name, tag or commit hash');
  }
}

export class CodeService {
  constructor(
    private readonly executor: RemoteExecutor,
    private readonly settings: Settings,
    private readonly appName: string
  ) {}

  /** Checkout directory in the remote user's home */
  get appDir(): string {
    return `~/${this.appName}`;
  }

  async sync(options: SyncOptions = {}): Promise<void> {
    const { branch = DEFAULT_BRANCH, commit = DEFAULT_COMMIT, clearCached = true } = options;
    assertGitRef(branch, 'branch');
    assertGitRef(commit, 'commit');

    const cwd = this.appDir;
    await this.executor.run('git fetch', { cwd });
    await this.executor.run(`git checkout ${branch}`, { cwd });

    if (commit !== DEFAULT_COMMIT) {
      await this.executor.run(`git checkout ${commit}`, { cwd });
    }

    if (clearCached) {
      await this.executor.runWithShellProfile(
        `find -type f -regex '${this.settings.remote.cachePattern}' -delete`,
        { cwd }
      );
    }
  }

  /**
   * Current `<branch>:<sha>` of the checkout
   */
  async stat(): Promise<string> {
    const result = await this.executor.run(
      'echo $(git rev-parse --abbrev-ref HEAD):$(git rev-parse --verify HEAD)',
      { cwd: this.appDir }
    );
    return result.stdout.trim();
  }
}
