import { spawn, execFile } from 'child_process';
import type { ChildProcess } from 'child_process';
import { promisify } from 'util';
import { config } from '../config';
import { logger } from '../utils/logger';
import { errorMessage, isDirectory } from '../utils/tools';
import type { BuildErrorAnalysis, PackageManager, ToolchainResult } from '../types';

const execFileAsync = promisify(execFile);

// Output beyond this many characters per stream is dropped from the head
const MAX_CAPTURED_OUTPUT = 1024 * 1024;

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface PackageManagerCommands {
  install: CommandSpec;
  build: CommandSpec;
  start: CommandSpec;
  dev: CommandSpec;
}

export type CommandTable = Record<PackageManager, PackageManagerCommands>;

export const DEFAULT_COMMANDS: CommandTable = {
  npm: {
    install: { command: 'npm', args: ['install'] },
    build: { command: 'npm', args: ['run', 'build'] },
    start: { command: 'npm', args: ['start'] },
    dev: { command: 'npm', args: ['run', 'dev'] }
  },
  yarn: {
    install: { command: 'yarn', args: ['install'] },
    build: { command: 'yarn', args: ['build'] },
    start: { command: 'yarn', args: ['start'] },
    dev: { command: 'yarn', args: ['dev'] }
  },
  pnpm: {
    install: { command: 'pnpm', args: ['install'] },
    build: { command: 'pnpm', args: ['run', 'build'] },
    start: { command: 'pnpm', args: ['start'] },
    dev: { command: 'pnpm', args: ['run', 'dev'] }
  }
};

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
}

/**
 * Sends a signal to the child and everything it started. On POSIX the child leads its own
 * process group, so the negative pid reaches grandchildren holding the output pipes.
 */
export function killProcessTree(child: ChildProcess, signal: NodeJS.Signals): void {
  try {
    if (process.platform !== 'win32' && child.pid !== undefined) {
      process.kill(-child.pid, signal);
    } else {
      child.kill(signal);
    }
  } catch (error) {
    logger.debug(`Could not send ${signal} to process group ${child.pid}: ${errorMessage(error)}`);
    child.kill(signal);
  }
}

function appendCapped(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > MAX_CAPTURED_OUTPUT ? next.slice(next.length - MAX_CAPTURED_OUTPUT) : next;
}

/**
 * Runs a command to completion inside cwd with a hard timeout.
 * The child gets its own working directory; the current process directory is never touched.
 * A timeout kills the whole process tree and settles as soon as the child exits, even when
 * an orphaned descendant still holds the output pipes open.
 */
export function runCommand(spec: CommandSpec, options: RunOptions): Promise<ToolchainResult> {
  const startedAt = Date.now();
  if (!isDirectory(options.cwd)) {
    return Promise.resolve({
      ok: false,
      stdout: '',
      stderr: `Directory does not exist: ${options.cwd}`,
      exitCode: null,
      failure: 'missing-directory',
      durationMs: 0
    });
  }

  return new Promise(resolve => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const child = spawn(spec.command, spec.args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
      shell: process.platform === 'win32'
    });

    const finish = (result: Omit<ToolchainResult, 'durationMs' | 'stdout' | 'stderr'>) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (timedOut) {
        child.stdout.destroy();
        child.stderr.destroy();
      }
      resolve({ ...result, stdout, stderr, durationMs: Date.now() - startedAt });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessTree(child, 'SIGKILL');
    }, options.timeoutMs);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on('error', error => {
      stderr = appendCapped(stderr, errorMessage(error));
      finish({ ok: false, exitCode: null, failure: 'spawn-error' });
    });

    const finishTimedOut = (code: number | null) => {
      if (settled) {
        return;
      }
      stderr = appendCapped(stderr, `\nCommand timed out after ${options.timeoutMs}ms`);
      finish({ ok: false, exitCode: code, failure: 'timeout' });
    };

    child.on('exit', code => {
      if (timedOut) {
        finishTimedOut(code);
      }
    });

    child.on('close', code => {
      if (timedOut) {
        finishTimedOut(code);
      } else if (code === 0) {
        finish({ ok: true, exitCode: 0 });
      } else {
        finish({ ok: false, exitCode: code, failure: 'exit-code' });
      }
    });
  });
}

/**
 * Install and build operations the pipeline depends on
 */
export interface Toolchain {
  install(projectPath: string, packageManager?: PackageManager): Promise<ToolchainResult>;
  build(projectPath: string, packageManager?: PackageManager): Promise<ToolchainResult>;
}

export interface ToolchainRunnerOptions {
  commands?: Partial<Record<PackageManager, Partial<PackageManagerCommands>>>;
  installTimeout?: number;
  buildTimeout?: number;
}

/**
 * Installs and builds projects with the package manager they were set up for
 */
export class ToolchainRunner implements Toolchain {
  private readonly commands: CommandTable;
  readonly installTimeout: number;
  readonly buildTimeout: number;

  constructor(options: ToolchainRunnerOptions = {}) {
    this.commands = {
      npm: { ...DEFAULT_COMMANDS.npm, ...options.commands?.npm },
      yarn: { ...DEFAULT_COMMANDS.yarn, ...options.commands?.yarn },
      pnpm: { ...DEFAULT_COMMANDS.pnpm, ...options.commands?.pnpm }
    };
    this.installTimeout = options.installTimeout ?? config.timeouts.install;
    this.buildTimeout = options.buildTimeout ?? config.timeouts.build;
  }

  commandsFor(packageManager: PackageManager): PackageManagerCommands {
    return this.commands[packageManager] ?? this.commands.npm;
  }

  /**
   * Command that serves the app on the given port. Vite-style dev scripts get the port as flags
   * since they ignore the PORT variable.
   */
  serveCommand(packageManager: PackageManager, script: 'start' | 'dev', port: number): CommandSpec {
    const commands = this.commandsFor(packageManager);
    if (script === 'start') {
      return commands.start;
    }
    const separator = packageManager === 'yarn' ? [] : ['--'];
    return {
      command: commands.dev.command,
      args: [...commands.dev.args, ...separator, '--port', String(port), '--strictPort']
    };
  }

  async install(projectPath: string, packageManager: PackageManager = 'npm'): Promise<ToolchainResult> {
    const spec = this.commandsFor(packageManager).install;
    logger.info(`Installing dependencies with ${packageManager} in ${projectPath}`);
    const result = await runCommand(spec, { cwd: projectPath, timeoutMs: this.installTimeout });
    this.logOutcome('Install', result);
    return result;
  }

  async build(projectPath: string, packageManager: PackageManager = 'npm'): Promise<ToolchainResult> {
    const spec = this.commandsFor(packageManager).build;
    logger.info(`Building project with ${packageManager} in ${projectPath}`);
    const result = await runCommand(spec, {
      cwd: projectPath,
      timeoutMs: this.buildTimeout,
      env: { CI: 'false' }
    });
    this.logOutcome('Build', result);
    return result;
  }

  private logOutcome(step: string, result: ToolchainResult): void {
    const seconds = (result.durationMs / 1000).toFixed(1);
    if (result.ok) {
      logger.info(`${step} finished in ${seconds}s`);
    } else {
      logger.warn(`${step} failed (${result.failure}) after ${seconds}s`);
      logger.debug(`${step} stderr: ${result.stderr.slice(0, 2000)}`);
    }
  }
}

/**
 * Checks that node, npm and git are available before a run
 */
export async function verifyEnvironment(): Promise<{ ok: boolean; message: string; versions: Record<string, string> }> {
  const tools: Array<[string, string]> = [
    ['node', process.platform === 'win32' ? 'node.exe' : 'node'],
    ['npm', process.platform === 'win32' ? 'npm.cmd' : 'npm'],
    ['git', process.platform === 'win32' ? 'git.exe' : 'git']
  ];
  const versions: Record<string, string> = {};
  const missing: string[] = [];

  for (const [name, binary] of tools) {
    try {
      const { stdout } = await execFileAsync(binary, ['--version'], {
        timeout: 10000,
        shell: process.platform === 'win32'
      });
      versions[name] = stdout.trim();
    } catch (error) {
      logger.debug(`${name} not available: ${errorMessage(error)}`);
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    return { ok: false, message: `Missing required tools: ${missing.join(', ')}`, versions };
  }
  const summary = Object.entries(versions).map(([name, version]) => `${name} ${version}`).join(', ');
  return { ok: true, message: `Environment ready: ${summary}`, versions };
}

/**
 * Sorts build output lines into categories and suggests a fix for each category found
 */
export function analyzeBuildErrors(stderr: string, stdout: string): BuildErrorAnalysis {
  const analysis: BuildErrorAnalysis = {
    dependencyErrors: [],
    typeErrors: [],
    lintWarnings: [],
    syntaxErrors: [],
    suggestions: []
  };

  const lines = `${stderr}\n${stdout}`.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  for (const line of lines) {
    const lower = line.toLowerCase();
    if (lower.includes('module not found') || lower.includes('cannot resolve') || lower.includes('cannot find module')) {
      analysis.dependencyErrors.push(line);
    } else if (lower.includes('typescript') || /\bts\d{4}\b/.test(lower)) {
      analysis.typeErrors.push(line);
    } else if (lower.includes('syntax error') || lower.includes('syntaxerror') || lower.includes('unexpected token') || lower.includes('parse error')) {
      analysis.syntaxErrors.push(line);
    } else if (lower.includes('eslint') || lower.includes('warning')) {
      analysis.lintWarnings.push(line);
    }
  }

  if (analysis.dependencyErrors.length > 0) {
    analysis.suggestions.push('Run npm install to ensure all dependencies are installed');
  }
  if (analysis.typeErrors.length > 0) {
    analysis.suggestions.push('Check TypeScript configuration and fix type errors');
  }
  if (analysis.lintWarnings.length > 0) {
    analysis.suggestions.push('Review and fix ESLint warnings for better code quality');
  }
  if (analysis.syntaxErrors.length > 0) {
    analysis.suggestions.push('Review code syntax and fix compilation errors');
  }
  if (analysis.suggestions.length === 0) {
    analysis.suggestions.push('Check the full error output for more details');
  }
  return analysis;
}
