import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ProjectInfo } from '../src/types';

export function makeTempDir(prefix = 'grader-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Writes files relative to root, creating parent directories
 */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function manifest(fields: Record<string, unknown>): string {
  return JSON.stringify(fields, null, 2);
}

export const REACT_MANIFEST = manifest({
  name: 'todo-app',
  scripts: { start: 'react-scripts start', build: 'react-scripts build' },
  dependencies: { react: '^18.2.0', 'react-dom': '^18.2.0', 'react-scripts': '5.0.1' }
});

export function projectInfo(overrides: Partial<ProjectInfo> = {}): ProjectInfo {
  return {
    hasManifest: true,
    hasFrameworkDependency: true,
    frameworkVersion: '^18.2.0',
    packageManager: 'npm',
    hasSrcFolder: true,
    hasPublicFolder: true,
    hasReadme: false,
    hasBuildScript: true,
    startScript: 'start',
    dependencies: { react: '^18.2.0', 'react-dom': '^18.2.0' },
    devDependencies: {},
    scripts: { start: 'react-scripts start', build: 'react-scripts build' },
    ...overrides
  };
}

/**
 * A node -e command line, usable as a toolchain command stand-in
 */
export function nodeScript(source: string): { command: string; args: string[] } {
  return { command: process.execPath, args: ['-e', source] };
}
