import * as path from 'path';
import { isDirectory, isFile, listFiles, readTextSafe } from '../utils/tools';
import type { ProjectInfo } from '../types';

// Heuristic checks used by the requirements evaluator. Each one is approximate by nature.

export const SOURCE_EXTENSIONS = ['.js', '.jsx', '.ts', '.tsx'];

const STOPWORDS = new Set([
  'the', 'and', 'for', 'with', 'use', 'uses', 'using', 'should', 'must', 'have', 'has', 'need', 'needs',
  'include', 'includes', 'implement', 'create', 'require', 'required', 'app', 'application', 'page', 'that',
  'this', 'are', 'all', 'from', 'into', 'each', 'its', 'proper', 'properly', 'component', 'components'
]);

// Packages every React project has; naming them in a requirement proves nothing
const BASELINE_PACKAGES = new Set(['react', 'react-dom', 'react-scripts', 'vite']);

function sourceFiles(projectPath: string): string[] {
  return listFiles(path.join(projectPath, 'src'), SOURCE_EXTENSIONS);
}

/**
 * Significant lowercase words of a requirement
 */
export function significantWords(requirement: string): string[] {
  return requirement
    .toLowerCase()
    .split(/[^a-z0-9@/._-]+/)
    .map(word => word.replace(/^[._/-]+|[._/-]+$/g, ''))
    .filter(word => word.length > 2 && !STOPWORDS.has(word));
}

/**
 * A source file named after a capitalized word of the requirement ("Header component" -> src/**\/Header.jsx)
 */
export function hasComponentFile(projectPath: string, requirement: string): boolean {
  const candidates = requirement
    .split(/[^A-Za-z0-9]+/)
    .filter(word => /^[A-Z][A-Za-z0-9]+$/.test(word))
    .map(word => word.toLowerCase());
  if (candidates.length === 0) {
    return false;
  }
  return sourceFiles(projectPath).some(file => {
    const base = path.basename(file, path.extname(file)).toLowerCase();
    return candidates.includes(base);
  });
}

/**
 * The manifest declares a package the requirement names
 */
export function hasDependency(projectInfo: ProjectInfo, requirement: string): boolean {
  const declared = new Set([...Object.keys(projectInfo.dependencies), ...Object.keys(projectInfo.devDependencies)]);
  return significantWords(requirement).some(word => !BASELINE_PACKAGES.has(word) && declared.has(word));
}

/**
 * Conventional project files and folders the requirement mentions exist
 */
export function hasConventionalFile(projectPath: string, projectInfo: ProjectInfo, requirement: string): boolean {
  const lower = requirement.toLowerCase();
  const checks: boolean[] = [];

  if (/\bsrc\b/.test(lower)) {
    checks.push(isDirectory(path.join(projectPath, 'src')));
  }
  if (/\bpublic\b/.test(lower)) {
    checks.push(isDirectory(path.join(projectPath, 'public')));
  }
  if (lower.includes('package.json')) {
    checks.push(projectInfo.hasManifest);
  }
  if (lower.includes('build script')) {
    checks.push(projectInfo.hasBuildScript);
  }
  if (lower.includes('readme')) {
    checks.push(isFile(path.join(projectPath, 'README.md')));
  }
  for (const token of requirement.split(/\s+/)) {
    const candidate = token.replace(/^[`'"(]+|[`'"),.;:]+$/g, '');
    if (candidate.includes('/') && /\.[a-z]{2,4}$/i.test(candidate)) {
      checks.push(isFile(path.join(projectPath, candidate)));
    }
  }

  return checks.length > 0 && checks.every(Boolean);
}

/**
 * A stylesheet under src contains rules mentioning a word of the requirement
 */
export function hasCssRule(projectPath: string, requirement: string): boolean {
  const words = significantWords(requirement);
  if (words.length === 0) {
    return false;
  }
  const stylesheets = listFiles(path.join(projectPath, 'src'), ['.css', '.scss', '.sass', '.less']);
  return stylesheets.some(file => {
    const css = readTextSafe(file).toLowerCase();
    if (!/[^{}]+\{[^}]*:[^}]*\}/.test(css)) {
      return false;
    }
    if (words.some(word => ['responsive', 'mobile'].includes(word)) && css.includes('@media')) {
      return true;
    }
    return words.some(word => css.includes(word));
  });
}

/**
 * The entry HTML declares a viewport meta tag
 */
export function hasViewportMeta(projectPath: string): boolean {
  return [path.join(projectPath, 'public', 'index.html'), path.join(projectPath, 'index.html')].some(file =>
    /<meta[^>]+name=["']viewport["']/i.test(readTextSafe(file))
  );
}

/**
 * No console.log or debugger statements in the source files
 */
export function lacksDebugStatements(projectPath: string): boolean {
  const debugPattern = /console\.log|\bdebugger\b/;
  return !sourceFiles(projectPath).some(file => debugPattern.test(readTextSafe(file)));
}

/**
 * A documentation requirement is backed by a README
 */
export function hasDocumentation(projectPath: string, requirement: string): boolean {
  if (!/readme|documentation|document/i.test(requirement)) {
    return false;
  }
  return readTextSafe(path.join(projectPath, 'README.md')).trim().length > 0;
}

// Fixed-weight bands

const ENTRY_FILES = ['App', 'index', 'main'].flatMap(name => SOURCE_EXTENSIONS.map(ext => `src/${name}${ext}`));

/**
 * Up to 20 points: package.json, src/, public/, README.md and a React entry file, 5 each
 */
export function scoreFileStructure(projectPath: string): number {
  let score = 0;
  if (isFile(path.join(projectPath, 'package.json'))) score += 5;
  if (isDirectory(path.join(projectPath, 'src'))) score += 5;
  if (isDirectory(path.join(projectPath, 'public'))) score += 5;
  if (isFile(path.join(projectPath, 'README.md'))) score += 5;
  if (ENTRY_FILES.some(file => isFile(path.join(projectPath, file)))) score += 5;
  return Math.min(score, 20);
}

export const CODE_QUALITY_SAMPLE_SIZE = 5;

/**
 * Up to 20 points from React import, export, component definition and PascalCase component files
 * across a sample of source files
 */
export function scoreCodeQuality(projectPath: string): number {
  const files = sourceFiles(projectPath);
  if (files.length === 0) {
    return 5;
  }

  let hasImports = false;
  let hasExports = false;
  let hasComponents = false;
  for (const file of files.slice(0, CODE_QUALITY_SAMPLE_SIZE)) {
    const content = readTextSafe(file);
    if (/import.*React/.test(content) || /from ['"]react['"]/.test(content)) hasImports = true;
    if (/export\s+default/.test(content) || /export\s+\{/.test(content)) hasExports = true;
    if (/function\s+[A-Z]\w*|const\s+[A-Z]\w*\s*=.*=>/.test(content)) hasComponents = true;
  }
  const properNaming = files.some(file => ['.jsx', '.tsx'].includes(path.extname(file)) && /^[A-Z]/.test(path.basename(file)));

  let score = 0;
  if (hasImports) score += 5;
  if (hasExports) score += 5;
  if (hasComponents) score += 8;
  if (properNaming) score += 7;
  return Math.min(score, 20);
}

/**
 * Up to 20 points: 20 for a successful build (5 otherwise), plus 5 each when routing or state
 * requirements are backed by matching source files
 */
export function scoreBuildFunctionality(projectPath: string, requirements: string[], buildSucceeded: boolean): number {
  let score = buildSucceeded ? 20 : 5;
  const lowered = requirements.map(requirement => requirement.toLowerCase());
  const files = sourceFiles(projectPath);
  const names = files.map(file => path.basename(file).toLowerCase());

  if (lowered.some(text => text.includes('route') || text.includes('navigation'))) {
    if (names.some(name => name.includes('route') || name.includes('router'))) {
      score += 5;
    }
  }
  if (lowered.some(text => text.includes('state'))) {
    const stateFiles = names.some(name => /store|context|reducer|slice|state/.test(name));
    if (stateFiles || files.some(file => /use(State|Reducer)\(/.test(readTextSafe(file)))) {
      score += 5;
    }
  }
  return Math.min(score, 20);
}
