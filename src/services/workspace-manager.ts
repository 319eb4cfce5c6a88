import * as fs from 'fs';
import * as path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { config } from '../config';
import { logger } from '../utils/logger';
import { errorMessage, isDirectory, isFile, listFiles, sleep } from '../utils/tools';
import { runCommand } from './toolchain-runner';
import type {
  AcquireResult,
  CloneFailureReason,
  InspectResult,
  PackageManager,
  ProjectInfo,
  RepositoryDescription
} from '../types';

const execFileAsync = promisify(execFile);

const UNNAMED_STUDENT = 'unnamed_student';
const MAX_DIRECTORY_NAME_LENGTH = 30;
const RELEASE_RETRIES = 3;

const manifestSchema = z.object({
  name: z.string().optional(),
  scripts: z.record(z.string()).optional(),
  dependencies: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional()
});

export type PackageManifest = z.infer<typeof manifestSchema>;

/**
 * Error thrown when the clone command fails; carries git's stderr as the message.
 */
export class CloneCommandError extends Error {
  constructor(message: string, readonly timedOut: boolean) {
    super(message);
    this.name = 'CloneCommandError';
  }
}

/**
 * Operations the pipeline needs from a workspace provider
 */
export interface Workspaces {
  acquire(repoUrl: string, studentKey: string): Promise<AcquireResult>;
  release(workspacePath: string): Promise<boolean>;
  releaseAll(): Promise<{ cleaned: number; errors: number }>;
  inspect(workspacePath: string): InspectResult;
}

/**
 * Maps a student identity to a directory name.
 * The result is lowercase, at most 30 characters, free of path-reserved characters
 * and never starts or ends with an underscore.
 */
export function sanitizeDirectoryName(name: string): string {
  const sanitized = name
    .replace(/[\s<>:"/\\|?*]/g, '_')
    .replace(/_+/g, '_')
    .toLowerCase()
    .slice(0, MAX_DIRECTORY_NAME_LENGTH)
    .replace(/^_+|_+$/g, '');
  return sanitized || UNNAMED_STUDENT;
}

/**
 * Turns raw git output into one of the clone failure reasons and a readable message
 */
export function classifyCloneError(raw: string, timedOut = false): { reason: CloneFailureReason; message: string } {
  const lower = raw.toLowerCase();
  if (timedOut || lower.includes('timed out') || lower.includes('timeout')) {
    return { reason: 'timeout', message: 'Clone operation timed out' };
  }
  if (lower.includes('repository not found') || lower.includes('not found')) {
    return { reason: 'not-found', message: 'Repository not found (may be private or deleted)' };
  }
  if (
    lower.includes('permission denied') ||
    lower.includes('authentication failed') ||
    lower.includes('could not read username')
  ) {
    return { reason: 'permission-denied', message: 'Permission denied (repository may be private)' };
  }
  return { reason: 'transport', message: `Git error: ${raw.trim()}` };
}

function readStringRecord(value: Record<string, string> | undefined): Record<string, string> {
  return value ?? {};
}

function emptyProjectInfo(): ProjectInfo {
  return {
    hasManifest: false,
    hasFrameworkDependency: false,
    packageManager: 'npm',
    hasSrcFolder: false,
    hasPublicFolder: false,
    hasReadme: false,
    hasBuildScript: false,
    dependencies: {},
    devDependencies: {},
    scripts: {}
  };
}

/**
 * Detects the package manager from its lock file, defaulting to npm
 */
export function detectPackageManager(projectPath: string): PackageManager {
  if (isFile(path.join(projectPath, 'yarn.lock'))) {
    return 'yarn';
  }
  if (isFile(path.join(projectPath, 'pnpm-lock.yaml'))) {
    return 'pnpm';
  }
  return 'npm';
}

/**
 * Makes every file and directory under root writable so it can be removed
 */
function makeWritable(root: string): void {
  const stat = fs.lstatSync(root);
  if (stat.isSymbolicLink()) {
    return;
  }
  if (stat.isDirectory()) {
    fs.chmodSync(root, 0o755);
    for (const entry of fs.readdirSync(root)) {
      makeWritable(path.join(root, entry));
    }
  } else {
    fs.chmodSync(root, 0o644);
  }
}

async function nativeRemove(target: string): Promise<void> {
  if (process.platform === 'win32') {
    await execFileAsync('cmd', ['/c', 'rmdir', '/s', '/q', target]);
  } else {
    await execFileAsync('rm', ['-rf', target]);
  }
}

export interface GitWorkspaceManagerOptions {
  reposDir?: string;
  cloneTimeout?: number;
  gitBinary?: string;
  retryDelay?: number;
}

/**
 * Clones student repositories into per-student directories and removes them afterwards
 */
export class GitWorkspaceManager implements Workspaces {
  readonly reposDir: string;
  private readonly cloneTimeout: number;
  private readonly gitBinary: string;
  private readonly retryDelay: number;

  constructor(options: GitWorkspaceManagerOptions = {}) {
    this.reposDir = path.resolve(options.reposDir ?? config.reposDir);
    this.cloneTimeout = options.cloneTimeout ?? config.timeouts.clone;
    this.gitBinary = options.gitBinary ?? 'git';
    this.retryDelay = options.retryDelay ?? 500;
  }

  workspacePathFor(studentKey: string): string {
    return path.join(this.reposDir, sanitizeDirectoryName(studentKey));
  }

  /**
   * Shallow-clones the repository into a freshly cleared directory
   */
  async acquire(repoUrl: string, studentKey: string): Promise<AcquireResult> {
    const workspacePath = this.workspacePathFor(studentKey);
    fs.mkdirSync(this.reposDir, { recursive: true });

    if (fs.existsSync(workspacePath)) {
      logger.info(`Removing stale workspace ${workspacePath}`);
      await this.release(workspacePath);
    }

    logger.info(`Cloning ${repoUrl} into ${workspacePath}`);
    try {
      await this.fetchRepository(repoUrl, workspacePath);
      logger.info(`Cloned ${repoUrl}`);
      return { ok: true, workspacePath };
    } catch (error) {
      const timedOut = error instanceof CloneCommandError && error.timedOut;
      const { reason, message } = classifyCloneError(errorMessage(error), timedOut);
      logger.error(`Clone failed for ${repoUrl}: ${message}`);
      await this.release(workspacePath);
      return { ok: false, reason, message, workspacePath };
    }
  }

  /**
   * Runs the actual depth-1 clone. Throws on failure.
   */
  protected async fetchRepository(repoUrl: string, target: string): Promise<void> {
    // runCommand kills git together with its helpers (ssh, git-remote-https) on timeout
    const result = await runCommand(
      { command: this.gitBinary, args: ['clone', '--depth', '1', repoUrl, target] },
      { cwd: this.reposDir, timeoutMs: this.cloneTimeout, env: { GIT_TERMINAL_PROMPT: '0' } }
    );
    if (!result.ok) {
      throw new CloneCommandError(result.stderr.trim() || `git exited with code ${result.exitCode}`, result.failure === 'timeout');
    }
  }

  /**
   * Removes a workspace, escalating through increasingly forceful strategies.
   * Returns false when every attempt failed; never throws.
   */
  async release(workspacePath: string): Promise<boolean> {
    if (!fs.existsSync(workspacePath)) {
      return true;
    }

    const strategies: Array<[string, (target: string) => Promise<void>]> = [
      ['recursive delete', target => fs.promises.rm(target, { recursive: true, force: true })],
      ['chmod and delete', async target => {
        makeWritable(target);
        await fs.promises.rm(target, { recursive: true, force: true });
      }],
      ['native delete', nativeRemove]
    ];

    for (const [name, remove] of strategies) {
      try {
        await remove(workspacePath);
        if (!fs.existsSync(workspacePath)) {
          logger.debug(`Released ${workspacePath} (${name})`);
          return true;
        }
      } catch (error) {
        logger.debug(`Release strategy '${name}' failed for ${workspacePath}: ${errorMessage(error)}`);
      }
    }

    for (let attempt = 1; attempt <= RELEASE_RETRIES; attempt++) {
      await sleep(this.retryDelay * attempt);
      try {
        makeWritable(workspacePath);
        await fs.promises.rm(workspacePath, { recursive: true, force: true, maxRetries: 2 });
        if (!fs.existsSync(workspacePath)) {
          return true;
        }
      } catch (error) {
        logger.debug(`Release retry ${attempt} failed for ${workspacePath}: ${errorMessage(error)}`);
      }
    }

    logger.error(`Could not remove workspace ${workspacePath}`);
    return false;
  }

  /**
   * Removes every workspace under the repos directory
   */
  async releaseAll(): Promise<{ cleaned: number; errors: number }> {
    let cleaned = 0;
    let errors = 0;
    if (!isDirectory(this.reposDir)) {
      return { cleaned, errors };
    }
    for (const entry of fs.readdirSync(this.reposDir)) {
      if (await this.release(path.join(this.reposDir, entry))) {
        cleaned++;
      } else {
        errors++;
      }
    }
    logger.info(`Workspace cleanup: ${cleaned} removed, ${errors} errors`);
    return { cleaned, errors };
  }

  /**
   * Reports the structure of a checked-out project and whether it is a React project
   */
  inspect(workspacePath: string): InspectResult {
    const info = emptyProjectInfo();
    info.packageManager = detectPackageManager(workspacePath);
    info.hasSrcFolder = isDirectory(path.join(workspacePath, 'src'));
    info.hasPublicFolder = isDirectory(path.join(workspacePath, 'public'));
    info.hasReadme = isFile(path.join(workspacePath, 'README.md'));

    const manifestPath = path.join(workspacePath, 'package.json');
    if (!isFile(manifestPath)) {
      return { valid: false, message: 'No package.json found - not a Node.js project', info };
    }
    info.hasManifest = true;

    let manifest: PackageManifest;
    try {
      const parsed = manifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return {
          valid: false,
          message: `Invalid package.json: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unexpected structure'}`,
          info
        };
      }
      manifest = parsed.data;
    } catch (error) {
      return { valid: false, message: `Invalid package.json: ${errorMessage(error)}`, info };
    }

    info.projectName = manifest.name;
    info.dependencies = readStringRecord(manifest.dependencies);
    info.devDependencies = readStringRecord(manifest.devDependencies);
    info.scripts = readStringRecord(manifest.scripts);
    info.hasBuildScript = 'build' in info.scripts;
    info.startScript = 'start' in info.scripts ? 'start' : 'dev' in info.scripts ? 'dev' : undefined;

    const reactVersion = info.dependencies.react ?? info.devDependencies.react;
    if (reactVersion === undefined) {
      return { valid: false, message: 'React dependency not found in package.json', info };
    }
    info.hasFrameworkDependency = true;
    info.frameworkVersion = reactVersion;

    return { valid: true, message: `Valid React project (react ${reactVersion})`, info };
  }

  /**
   * Size, file count and last commit of a workspace
   */
  async describe(workspacePath: string): Promise<RepositoryDescription> {
    const files = listFiles(workspacePath);
    const totalSize = files.reduce((sum, file) => sum + fs.statSync(file).size, 0);
    const description: RepositoryDescription = { fileCount: files.length, totalSize };
    try {
      const { stdout } = await execFileAsync(this.gitBinary, ['log', '-1', '--format=%H%x1f%an%x1f%ad%x1f%s'], {
        cwd: workspacePath,
        timeout: 10000
      });
      const [hash, author, date, message] = stdout.trim().split('\x1f');
      if (hash && author !== undefined && date !== undefined && message !== undefined) {
        description.lastCommit = { hash, author, date, message };
      }
    } catch (error) {
      logger.debug(`No commit information for ${workspacePath}: ${errorMessage(error)}`);
    }
    return description;
  }
}
