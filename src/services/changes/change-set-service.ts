/**
 * Change Set Service
 *
 * Produces the normalized list of changed paths for an analysis, either
 * from a CI-provided list or from git. Git changes come with the unified
 * diff of each file so retrieval can query on what actually changed.
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import { ValidationError, describeError } from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { normalizeChangeSet, parseChangedFiles } from '../../core/validation.js';

/**
 * The git operations the service needs
 */
export type GitClient = Pick<SimpleGit, 'checkIsRepo' | 'diffSummary' | 'diff'>;

export interface ChangeSet {
  files: string[];
  /** Hunks per changed path; files without text hunks are absent */
  diffs: Record<string, string>;
}

export interface GitRange {
  base: string;
  /** Compare against the working tree when omitted */
  head?: string;
}

export interface ChangeSetServiceOptions {
  root?: string;
  git?: GitClient;
  logger?: Logger;
}

const DIFF_FLAGS = ['--no-renames', '--no-color'];

export class ChangeSetService {
  private readonly root: string;
  private gitClient: GitClient | null;
  private readonly log: Logger;

  constructor(options: ChangeSetServiceOptions = {}) {
    this.root = options.root ?? '.';
    this.gitClient = options.git ?? null;
    this.log = (options.logger ?? rootLogger).child('changes');
  }

  /**
   * Opened on first use, so list-based change sets work outside a repository
   */
  private get git(): GitClient {
    if (this.gitClient === null) {
      this.gitClient = simpleGit(this.root);
    }
    return this.gitClient;
  }

  /**
   * Change set from a newline- or comma-separated list, without diffs
   */
  fromList(raw: string | readonly string[] | undefined): ChangeSet {
    const entries = typeof raw === 'string' || raw === undefined ? parseChangedFiles(raw) : raw;
    return { files: normalizeChangeSet(entries), diffs: {} };
  }

  /**
   * Change set between two git revisions
   *
   * @throws ValidationError when root is not a repository or the range is unknown
   */
  async fromGit(range: GitRange): Promise<ChangeSet> {
    if (!(await this.git.checkIsRepo())) {
      throw new ValidationError(`Not a git repository: ${this.root}`, 'root');
    }

    const revisions = range.head ? [`${range.base}...${range.head}`] : [range.base];
    let changed: string[];
    let diffText: string;
    try {
      const summary = await this.git.diffSummary([...DIFF_FLAGS, ...revisions]);
      changed = summary.files.map(file => file.file);
      diffText = await this.git.diff([...DIFF_FLAGS, ...revisions]);
    } catch (error) {
      throw new ValidationError(`git diff against ${revisions[0]} failed: ${describeError(error)}`, 'base');
    }

    const files = normalizeChangeSet(changed);
    const split = splitUnifiedDiff(diffText);
    const diffs: Record<string, string> = {};
    for (const file of files) {
      const hunks = split[file];
      if (hunks !== undefined) {
        diffs[file] = hunks;
      }
    }

    this.log.debug('Collected git changes', { range: revisions[0], files: files.length });
    return { files, diffs };
  }
}

/**
 * Splits `git diff` output into the hunk text of each file, keyed by the
 * post-image path; deleted files keep the path from the `diff --git` line
 */
export function splitUnifiedDiff(diff: string): Record<string, string> {
  const result: Record<string, string> = {};
  let current: string | null = null;
  let inHunk = false;
  let lines: string[] = [];

  const flush = () => {
    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    if (current !== null && lines.length > 0) {
      result[current] = lines.join('\n');
    }
  };

  for (const line of diff.split(/\r?\n/)) {
    const header = /^diff --git a\/(.+) b\/(.+)$/.exec(line);
    if (header) {
      flush();
      current = header[2];
      inHunk = false;
      lines = [];
      continue;
    }
    if (current === null) continue;

    if (!inHunk) {
      if (line.startsWith('+++ b/')) {
        current = line.slice('+++ b/'.length);
      } else if (line.startsWith('@@')) {
        inHunk = true;
        lines.push(line);
      }
      continue;
    }
    lines.push(line);
  }
  flush();

  return result;
}
